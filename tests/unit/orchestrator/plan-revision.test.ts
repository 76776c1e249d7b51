import { comparePlans, remediationSteps, stepSignature } from '../../../src/orchestrator/plan-revision';
import type { PlanStep } from '../../../src/orchestrator/data-flow';

const step = (index: number, description: string, revision = 0): PlanStep => ({ index, description, arguments: {}, revision });

describe('comparePlans', () => {
  it('should treat plans differing only in revision as unchanged', () => {
    expect(comparePlans([step(1, 'a'), step(2, 'b')], [step(1, 'a', 1), step(2, 'b', 1)])).toEqual({ changed: false, added: [], removed: [] });
  });

  it('should report added and removed steps', () => {
    const result = comparePlans([step(1, 'a'), step(2, 'b')], [step(1, 'a'), step(2, 'c')]);

    expect(result.changed).toBe(true);
    expect(result.removed).toEqual([stepSignature(step(2, 'b'))]);
    expect(result.added).toEqual([stepSignature(step(2, 'c'))]);
  });

  it('should see different capability arguments as a change', () => {
    const before: PlanStep = { index: 1, description: 'search', capability: { kind: 'tool', name: 'web' }, arguments: { q: 'cats' }, revision: 0 };
    const after: PlanStep = { ...before, arguments: { q: 'dogs' } };

    expect(comparePlans([before], [after]).changed).toBe(true);
  });
});

describe('remediationSteps', () => {
  it('should number new steps after the existing plan', () => {
    expect(remediationSteps([step(1, 'a')], [{ step: 1, message: 'too short' }], 2)).toEqual([{ index: 2, description: 'Address validator feedback on step 1: too short', arguments: {}, revision: 2 }]);
  });
});
