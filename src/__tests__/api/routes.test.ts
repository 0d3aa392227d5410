import request from 'supertest';
import { createApp } from '../../api/server';
import { proseOnlyCompletion, validCompletion } from '../fixtures/completions';
import { baseProfileInput } from '../fixtures/profiles';
import { createTestPipeline, ScriptedProvider, silenceConsole } from '../utils/testHelpers';

function appWith(responses: string[]) {
  return createApp({ pipeline: createTestPipeline(new ScriptedProvider(responses)) });
}

beforeEach(() => {
  silenceConsole();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('GET /', () => {
  it('should describe the API', async () => {
    const response = await request(appWith([validCompletion])).get('/');

    expect(response.status).toBe(200);
    expect(response.body.message).toBe('Investment Allocation Advisor API');
  });
});

describe('GET /api', () => {
  it('should return API information', async () => {
    const response = await request(appWith([validCompletion])).get('/api');

    expect(response.status).toBe(200);
    expect(response.body.endpoints).toEqual({
      recommendation: 'POST /api/recommendation',
      metrics: 'POST /api/metrics',
      health: 'GET /api/health',
    });
  });
});

describe('GET /api/health', () => {
  it('should return status ok with timestamp', async () => {
    const response = await request(appWith([validCompletion])).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.timestamp).toBeDefined();
  });
});

describe('GET /api/recommendation', () => {
  it('should return endpoint information', async () => {
    const response = await request(appWith([validCompletion])).get('/api/recommendation');

    expect(response.status).toBe(200);
    expect(response.body.method).toBe('POST');
    expect(response.body.endpoint).toBe('/api/recommendation');
    expect(response.body.requiredFields).toContain('goals[]');
  });
});

describe('POST /api/recommendation', () => {
  it('should return an AI-generated portfolio', async () => {
    const response = await request(appWith([validCompletion]))
      .post('/api/recommendation')
      .send(baseProfileInput);

    expect(response.status).toBe(200);
    expect(response.body.provenance).toBe('ai-generated');
    expect(response.body.allocation).toEqual({
      equities: 55,
      bonds: 25,
      realEstate: 10,
      cashEquivalents: 5,
      alternatives: 5,
    });
    expect(response.body.metrics.investmentCapacity).toBe(30000);
    expect(response.body.goals.map((goal: { category: string }) => goal.category)).toEqual([
      'retirement',
      'vehicle',
    ]);
    expect(response.body.goalPlans).toHaveLength(1);
    expect(response.body.goalPlans[0]).toMatchObject({ category: 'retirement', timelineYears: 30 });
  });

  it('should return a rule-based portfolio when the response is unusable', async () => {
    const response = await request(appWith([proseOnlyCompletion]))
      .post('/api/recommendation')
      .send(baseProfileInput);

    expect(response.status).toBe(200);
    expect(response.body.provenance).toBe('fallback-rule-based');
    expect(response.body.allocation.equities).toBe(50);
  });

  it('should return 400 with issues for an invalid profile', async () => {
    const response = await request(appWith([validCompletion]))
      .post('/api/recommendation')
      .send({ ...baseProfileInput, age: 17 });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: 'Invalid user profile',
      issues: ['age: Number must be greater than or equal to 18'],
    });
  });

  it('should not call the completion service for an invalid profile', async () => {
    const provider = new ScriptedProvider([validCompletion]);
    const app = createApp({ pipeline: createTestPipeline(provider) });

    await request(app).post('/api/recommendation').send({});

    expect(provider.calls).toBe(0);
  });

  it('should return 400 for a body that is not valid JSON', async () => {
    const response = await request(appWith([validCompletion]))
      .post('/api/recommendation')
      .set('Content-Type', 'application/json')
      .send('{"age": ');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Bad request');
  });
});

describe('POST /api/metrics', () => {
  it('should return metrics and classified goals', async () => {
    const response = await request(appWith([validCompletion]))
      .post('/api/metrics')
      .send(baseProfileInput);

    expect(response.status).toBe(200);
    expect(response.body.metrics.riskScore).toBe(57.5);
    expect(response.body.metrics.riskBand).toBe('medium');
    expect(response.body.metrics.financialHealthScore).toBe(100);
    expect(response.body.metrics.riskCapacity).toBe('medium');
    expect(response.body.goals).toEqual([
      { category: 'retirement', priority: 2, rawText: 'Retirement savings' },
      { category: 'vehicle', priority: 10, rawText: 'Buy a car' },
    ]);
  });

  it('should return 400 for an invalid profile', async () => {
    const response = await request(appWith([validCompletion]))
      .post('/api/metrics')
      .send({ ...baseProfileInput, goals: [] });

    expect(response.status).toBe(400);
    expect(response.body.issues).toEqual(['goals: Array must contain at least 1 element(s)']);
  });
});
