import { createMemoryStore, StoreError } from '../../src/storage/memory-store';
import { WorkflowStore } from '../../src/storage/store';
import { StepStatus, Workflow, WorkflowStatus } from '../../src/domain/workflow';

function makeWorkflow(id: string, sessionId: string = 'sess_1', createdAt: string = '2026-01-01T00:00:00.000Z'): Workflow {
  return {
    id,
    sessionId,
    userIntent: 'Find a flat',
    status: WorkflowStatus.Created,
    currentStep: null,
    createdAt,
    updatedAt: createdAt,
    steps: [
      {
        stepNumber: 1,
        stepType: 'tool_call',
        toolName: 'listing_search',
        description: 'Search',
        toolParameters: { city: 'Berlin' },
        requiresConfirmation: false,
        status: StepStatus.Pending,
        attempts: 0,
      },
      {
        stepNumber: 2,
        stepType: 'notification',
        description: 'Report',
        toolParameters: {},
        requiresConfirmation: false,
        status: StepStatus.Pending,
        attempts: 0,
      },
    ],
  };
}

describe('MemoryWorkflowStore', () => {
  let store: WorkflowStore;

  beforeEach(() => {
    store = createMemoryStore().workflows;
  });

  test('create and getById round-trip without aliasing', async () => {
    const workflow = makeWorkflow('wf_1');
    await store.create(workflow);
    workflow.steps[0].toolParameters.city = 'Paris';

    const loaded = await store.getById('wf_1');
    expect(loaded?.steps[0].toolParameters).toEqual({ city: 'Berlin' });

    if (loaded) loaded.status = WorkflowStatus.Failed;
    expect((await store.getById('wf_1'))?.status).toBe(WorkflowStatus.Created);
    expect(await store.getById('wf_missing')).toBeNull();
  });

  test('rejects duplicate ids', async () => {
    await store.create(makeWorkflow('wf_1'));
    await expect(store.create(makeWorkflow('wf_1'))).rejects.toMatchObject({
      typedError: { code: 'WORKFLOW.DUPLICATE' },
    });
  });

  test('getLatestBySession picks the most recently created workflow', async () => {
    await store.create(makeWorkflow('wf_old', 'sess_1', '2026-01-01T00:00:00.000Z'));
    await store.create(makeWorkflow('wf_new', 'sess_1', '2026-01-02T00:00:00.000Z'));
    await store.create(makeWorkflow('wf_other', 'sess_2', '2026-01-03T00:00:00.000Z'));

    expect((await store.getLatestBySession('sess_1'))?.id).toBe('wf_new');
    expect(await store.getLatestBySession('sess_none')).toBeNull();
  });

  test('list filters, sorts newest first and pages', async () => {
    await store.create(makeWorkflow('wf_a', 'sess_1', '2026-01-01T00:00:00.000Z'));
    await store.create(makeWorkflow('wf_b', 'sess_2', '2026-01-02T00:00:00.000Z'));
    await store.create(makeWorkflow('wf_c', 'sess_1', '2026-01-03T00:00:00.000Z'));
    await store.updateWorkflow('wf_a', { status: WorkflowStatus.Running });

    expect((await store.list()).map((w) => w.id)).toEqual(['wf_c', 'wf_b', 'wf_a']);
    expect((await store.list({ sessionId: 'sess_1' })).map((w) => w.id)).toEqual(['wf_c', 'wf_a']);
    expect((await store.list({ status: WorkflowStatus.Running })).map((w) => w.id)).toEqual(['wf_a']);
    expect((await store.list({ limit: 1, offset: 1 })).map((w) => w.id)).toEqual(['wf_b']);
  });

  test('updateWorkflow patches fields and touches updatedAt', async () => {
    await store.create(makeWorkflow('wf_1'));
    await store.updateWorkflow('wf_1', { status: WorkflowStatus.Running });
    const updated = await store.updateWorkflow('wf_1', { status: WorkflowStatus.WaitingConfirmation, currentStep: 2 });

    expect(updated).toMatchObject({ status: WorkflowStatus.WaitingConfirmation, currentStep: 2 });
    expect(updated?.updatedAt).not.toBe('2026-01-01T00:00:00.000Z');
    expect(await store.updateWorkflow('wf_missing', { status: WorkflowStatus.Running })).toBeNull();
  });

  test('completeStep stores the result and status together', async () => {
    await store.create(makeWorkflow('wf_1'));
    await store.updateStep('wf_1', 1, { status: StepStatus.Running, attempts: 1, errorMessage: 'first try failed' });

    const updated = await store.completeStep('wf_1', 1, { listings: 3 });

    expect(updated?.steps[0]).toMatchObject({ status: StepStatus.Completed, result: { listings: 3 }, attempts: 1 });
    expect(updated?.steps[0].errorMessage).toBeUndefined();
    expect(updated?.steps[0].completedAt).toBeDefined();
  });

  test('completed steps are immutable', async () => {
    await store.create(makeWorkflow('wf_1'));
    await store.updateStep('wf_1', 1, { status: StepStatus.Running });
    await store.completeStep('wf_1', 1, { listings: 3 });

    const err: unknown = await store.updateStep('wf_1', 1, { result: { listings: 0 } }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreError);
    if (err instanceof StoreError) {
      expect(err.typedError.code).toBe('STEP.IMMUTABLE');
    }
    expect((await store.getById('wf_1'))?.steps[0].result).toEqual({ listings: 3 });
  });

  test('a cancelled step cannot be completed afterwards', async () => {
    await store.create(makeWorkflow('wf_1'));
    await store.updateStep('wf_1', 1, { status: StepStatus.Running });
    await store.updateStep('wf_1', 1, { status: StepStatus.Cancelled });

    await expect(store.completeStep('wf_1', 1, { listings: 3 })).rejects.toMatchObject({
      typedError: { code: 'STEP.IMMUTABLE', message: 'Step 1 of workflow wf_1 is cancelled and cannot change' },
    });
    expect((await store.getById('wf_1'))?.steps[0]).toMatchObject({ status: StepStatus.Cancelled });
    expect((await store.getById('wf_1'))?.steps[0].result).toBeUndefined();
  });

  test('step status changes follow the transition table', async () => {
    await store.create(makeWorkflow('wf_1'));

    await expect(store.completeStep('wf_1', 1, { listings: 3 })).rejects.toMatchObject({
      typedError: { code: 'STEP.INVALID_TRANSITION', details: { from: 'pending', to: 'completed' } },
    });
    await expect(store.updateStep('wf_1', 1, { attempts: 2 })).resolves.toMatchObject({ id: 'wf_1' });
  });

  test('a terminal workflow cannot change', async () => {
    await store.create(makeWorkflow('wf_1'));
    await store.updateWorkflow('wf_1', { status: WorkflowStatus.Cancelled });

    await expect(store.updateWorkflow('wf_1', { status: WorkflowStatus.Running })).rejects.toMatchObject({
      typedError: { code: 'WORKFLOW.IMMUTABLE' },
    });
    expect((await store.getById('wf_1'))?.status).toBe(WorkflowStatus.Cancelled);
  });

  test('workflow status changes follow the transition table', async () => {
    await store.create(makeWorkflow('wf_1'));

    await expect(store.updateWorkflow('wf_1', { status: WorkflowStatus.Completed })).rejects.toMatchObject({
      typedError: { code: 'WORKFLOW.INVALID_TRANSITION', details: { from: 'created', to: 'completed' } },
    });
  });

  test('updating an unknown step fails', async () => {
    await store.create(makeWorkflow('wf_1'));
    await expect(store.updateStep('wf_1', 9, { attempts: 1 })).rejects.toThrow('Step 9 not found in workflow wf_1');
  });

  test('delete removes a workflow', async () => {
    await store.create(makeWorkflow('wf_1'));
    expect(await store.delete('wf_1')).toBe(true);
    expect(await store.delete('wf_1')).toBe(false);
    expect(await store.getById('wf_1')).toBeNull();
  });
});
