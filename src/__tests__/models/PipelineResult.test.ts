import { describeFailure, fail, ok } from '../../models/PipelineResult';

describe('ok and fail', () => {
  it('should build tagged results', () => {
    expect(ok(5)).toEqual({ ok: true, value: 5 });
    expect(fail('bad')).toEqual({ ok: false, failure: 'bad' });
  });
});

describe('describeFailure', () => {
  it('should name the failure kind for service failures', () => {
    expect(
      describeFailure({ type: 'external-service', kind: 'rate-limited', message: '429', attempts: 3, cancelled: false })
    ).toBe('rate-limited');
  });

  it('should say when the caller cancelled', () => {
    expect(
      describeFailure({ type: 'external-service', kind: 'timeout', message: 'cancelled', attempts: 1, cancelled: true })
    ).toBe('request cancelled');
  });

  it('should describe parse, repair and unexpected failures', () => {
    expect(describeFailure({ type: 'malformed-allocation', issues: ['x'] })).toBe('unusable allocation in response');
    expect(describeFailure({ type: 'constraint-repair', message: 'x', clippedExcess: 30 })).toBe(
      'proposal outside allocation limits'
    );
    expect(describeFailure({ type: 'unexpected', message: 'x' })).toBe('internal error');
  });
});
