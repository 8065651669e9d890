import {
  resolve,
  resolveParameters,
  parsePath,
  findUnresolvedPlaceholders,
  extractStepReferences,
  buildExecutionContext,
  assertFullyResolved,
  UnresolvedReferenceError,
  ExecutionContext,
} from '../../src/engine/context-resolver';
import { Step, StepStatus } from '../../src/domain/workflow';

const context: ExecutionContext = {
  step_1: {
    result: {
      companyName: 'Acme',
      count: 3,
      tags: ['a', 'b'],
      empty: '',
      jobs: [{ title: 'Dev' }, { title: 'Ops' }],
    },
  },
};

describe('resolve', () => {
  test('a whole-string placeholder keeps the value type', () => {
    expect(resolve('{{step_1.result.count}}', context)).toBe(3);
    expect(resolve('{{step_1.result.tags}}', context)).toEqual(['a', 'b']);
  });

  test('matches keys loosely across snake and camel case', () => {
    expect(resolve('{{step_1.result.company_name}}', context)).toBe('Acme');
  });

  test('embeds values inside larger strings', () => {
    expect(resolve('Apply at {{step_1.result.companyName}} ({{step_1.result.count}} roles)', context))
      .toBe('Apply at Acme (3 roles)');
    expect(resolve('Tags: {{step_1.result.tags}}', context)).toBe('Tags: ["a","b"]');
  });

  test('walks list indices in both notations', () => {
    expect(resolve('{{step_1.result.jobs[1].title}}', context)).toBe('Ops');
    expect(resolve('{{step_1.result.jobs.0.title}}', context)).toBe('Dev');
  });

  test('leaves unknown paths exactly as written', () => {
    expect(resolve('{{step_1.result.salary}}', context)).toBe('{{step_1.result.salary}}');
    expect(resolve('Hi {{step_4.result.name}}!', context)).toBe('Hi {{step_4.result.name}}!');
  });

  test('treats empty strings as missing and falls through pipe candidates', () => {
    expect(resolve('{{step_1.result.empty|"n/a"}}', context)).toBe('n/a');
    expect(resolve('{{step_1.result.missing|step_1.result.companyName}}', context)).toBe('Acme');
    expect(resolve('{{step_1.result.missing|step_2.result.x}}', context))
      .toBe('{{step_1.result.missing|step_2.result.x}}');
  });

  test('recurses through arrays and objects', () => {
    expect(resolveParameters(
      { to: 'hr@example.com', body: { lines: ['Role: {{step_1.result.jobs[0].title}}'] }, n: 5 },
      context,
    )).toEqual({ to: 'hr@example.com', body: { lines: ['Role: Dev'] }, n: 5 });
  });
});

describe('parsePath', () => {
  test('normalizes brackets and dots', () => {
    expect(parsePath('step_1.result.items[0]["name"]')).toEqual(['step_1', 'result', 'items', '0', 'name']);
    expect(parsePath('  a..b ')).toEqual(['a', 'b']);
  });
});

describe('findUnresolvedPlaceholders / assertFullyResolved', () => {
  test('collects every template left in nested values', () => {
    expect(findUnresolvedPlaceholders({ a: '{{x}} and {{y}}', b: ['{{z}}'], c: 1 })).toEqual(['{{x}}', '{{y}}', '{{z}}']);
  });

  test('throws a typed error with the unique placeholders', () => {
    expect(() => assertFullyResolved({ to: '{{step_1.result.email}}', cc: '{{step_1.result.email}}' }, 2))
      .toThrow(UnresolvedReferenceError);
    try {
      assertFullyResolved({ to: '{{step_1.result.email}}', cc: '{{step_1.result.email}}' }, 2);
    } catch (err) {
      expect(err).toBeInstanceOf(UnresolvedReferenceError);
      if (err instanceof UnresolvedReferenceError) {
        expect(err.message).toBe('Unresolved references: {{step_1.result.email}}');
        expect(err.typedError.code).toBe('STEP.UNRESOLVED_REFERENCE');
        expect(err.typedError.stepNumber).toBe(2);
        expect(err.typedError.retryable).toBe(false);
      }
    }
  });

  test('passes fully resolved values', () => {
    expect(() => assertFullyResolved({ to: 'a@example.com' })).not.toThrow();
  });
});

describe('extractStepReferences', () => {
  test('reports step numbers and field paths below result', () => {
    expect(extractStepReferences({ q: '{{step_2.result.company_name|step_1.result.name}}', n: 'plain' })).toEqual([
      { stepNumber: 2, fieldPath: ['company_name'], raw: '{{step_2.result.company_name|step_1.result.name}}' },
      { stepNumber: 1, fieldPath: ['name'], raw: '{{step_2.result.company_name|step_1.result.name}}' },
    ]);
  });

  test('ignores placeholders that are not step references', () => {
    expect(extractStepReferences('{{user.name}} {{"literal"}}')).toEqual([]);
  });
});

describe('buildExecutionContext', () => {
  function step(stepNumber: number, status: StepStatus, result?: unknown): Step {
    return {
      stepNumber,
      stepType: 'analysis',
      description: `Step ${stepNumber}`,
      toolParameters: {},
      requiresConfirmation: false,
      status,
      result,
      attempts: 0,
    };
  }

  test('includes only completed steps before the given number', () => {
    const steps = [
      step(1, StepStatus.Completed, { a: 1 }),
      step(2, StepStatus.Failed),
      step(3, StepStatus.Completed, { c: 3 }),
      step(4, StepStatus.Pending),
    ];
    expect(buildExecutionContext(steps, 3)).toEqual({ step_1: { result: { a: 1 } } });
    expect(buildExecutionContext(steps, 4)).toEqual({
      step_1: { result: { a: 1 } },
      step_3: { result: { c: 3 } },
    });
  });
});
