import { WorkflowStatus } from '../../src/domain/workflow';
import { ScriptedProvider, planReply } from '../fakes';
import { TestServer, latestWorkflow, startServer, waitForStatus } from './http';

describe('Workflow API', () => {
  let provider: ScriptedProvider;
  let server: TestServer;

  beforeEach(async () => {
    provider = new ScriptedProvider();
    server = await startServer(provider);
  });

  afterEach(async () => {
    await server.close();
  });

  const helloPlan = planReply([{ type: 'notification', description: 'Hello there' }]);

  async function plan(sessionId: string, reply = helloPlan): Promise<string> {
    provider.push(reply);
    const res = await server.request('POST', '/api/v1/workflows', { intent: 'say hello', sessionId, autoRun: false });
    expect(res.status).toBe(201);
    return (await latestWorkflow(server.ctx, sessionId)).id;
  }

  test('POST /api/v1/workflows plans without running when autoRun is false', async () => {
    provider.push(helloPlan);

    const res = await server.request('POST', '/api/v1/workflows', {
      intent: '  say hello  ',
      sessionId: 'sess_1',
      autoRun: false,
    });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      workflow: {
        sessionId: 'sess_1',
        userIntent: 'say hello',
        status: 'created',
        currentStep: null,
        steps: [{ stepNumber: 1, stepType: 'notification', description: 'Hello there', status: 'pending' }],
      },
    });
    expect((await latestWorkflow(server.ctx, 'sess_1')).status).toBe(WorkflowStatus.Created);
  });

  test('POST /api/v1/workflows starts the run in the background by default', async () => {
    provider.push(helloPlan);

    const res = await server.request('POST', '/api/v1/workflows', { intent: 'say hello', sessionId: 'sess_1' });

    expect(res.status).toBe(201);
    const workflow = await latestWorkflow(server.ctx, 'sess_1');
    const finished = await waitForStatus(server.ctx, workflow.id, WorkflowStatus.Completed);
    expect(finished.steps[0].result).toMatchObject({ message: 'Hello there' });
  });

  test('POST /api/v1/workflows/:id/run executes a planned workflow', async () => {
    const id = await plan('sess_1');

    const res = await server.request('POST', `/api/v1/workflows/${id}/run`);

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ workflowId: id, status: 'created', accepted: true });
    await waitForStatus(server.ctx, id, WorkflowStatus.Completed);

    const fetched = await server.request('GET', `/api/v1/workflows/${id}`);
    expect(fetched.status).toBe(200);
    expect(fetched.body).toMatchObject({ workflow: { id, status: 'completed', currentStep: null } });
  });

  test('rejects a request without an intent', async () => {
    const res = await server.request('POST', '/api/v1/workflows', { sessionId: 'sess_1' });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: { code: 'VALIDATION.SCHEMA', message: 'intent is required and must be a non-empty string' },
    });
    expect(provider.calls).toHaveLength(0);
  });

  test('rejects a non-boolean autoRun', async () => {
    const res = await server.request('POST', '/api/v1/workflows', { intent: 'hi', sessionId: 'sess_1', autoRun: 'yes' });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'VALIDATION.SCHEMA', message: 'autoRun must be a boolean' } });
  });

  test('rejects a malformed JSON body', async () => {
    const res = await server.request('POST', '/api/v1/workflows', undefined, '{"intent":');

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: { code: 'VALIDATION.MALFORMED_JSON', message: 'Request body is not valid JSON' },
    });
  });

  test('an unusable plan surfaces as 422', async () => {
    provider.push(planReply([]));

    const res = await server.request('POST', '/api/v1/workflows', { intent: 'do nothing', sessionId: 'sess_1' });

    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({
      error: { code: 'PLANNER.INVALID_PLAN', message: 'Invalid plan: Plan contains no steps' },
    });
    expect(await server.ctx.store.workflows.getLatestBySession('sess_1')).toBeNull();
  });

  test('GET /api/v1/workflows filters by session and validates the query', async () => {
    const a = await plan('sess_a');
    await plan('sess_b');

    const bySession = await server.request('GET', '/api/v1/workflows?sessionId=sess_a');
    expect(bySession.status).toBe(200);
    expect(bySession.body).toMatchObject({ workflows: [{ id: a, sessionId: 'sess_a' }] });

    const badStatus = await server.request('GET', '/api/v1/workflows?status=bogus');
    expect(badStatus.status).toBe(400);
    expect(badStatus.body).toMatchObject({
      error: { message: 'status must be one of created, running, waiting_confirmation, completed, failed, cancelled' },
    });

    const badLimit = await server.request('GET', '/api/v1/workflows?limit=-1');
    expect(badLimit.status).toBe(400);
    expect(badLimit.body).toMatchObject({ error: { message: 'limit must be a non-negative integer' } });
  });

  test('GET /api/v1/workflows/:id returns 404 for unknown ids', async () => {
    const res = await server.request('GET', '/api/v1/workflows/wf_missing');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ error: { code: 'WORKFLOW.NOT_FOUND', message: 'Workflow not found: wf_missing' } });
  });

  describe('confirmation', () => {
    const sendEmail = jest.fn<Promise<Record<string, unknown>>, [Record<string, unknown>]>(async () => ({
      messageId: 'msg_1',
    }));
    const emailPlan = planReply([
      {
        type: 'tool_call',
        tool: 'send_email',
        description: 'Email HR',
        parameters: { to: 'hr@example.com', subject: 'Application', body: 'Hello' },
      },
    ]);

    beforeEach(() => {
      sendEmail.mockClear();
      server.ctx.tools.register({ name: 'send_email', description: 'Send an email', parameters: {} }, sendEmail);
    });

    async function pausedWorkflow(): Promise<string> {
      const id = await plan('sess_1', emailPlan);
      await server.request('POST', `/api/v1/workflows/${id}/run`);
      await waitForStatus(server.ctx, id, WorkflowStatus.WaitingConfirmation);
      return id;
    }

    test('confirm is refused while nothing is waiting', async () => {
      const id = await plan('sess_1', emailPlan);

      const res = await server.request('POST', `/api/v1/workflows/${id}/confirm`, { approved: true });

      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ error: { code: 'WORKFLOW.INVALID_STATE' } });
    });

    test('confirm requires a boolean decision', async () => {
      const id = await pausedWorkflow();

      const res = await server.request('POST', `/api/v1/workflows/${id}/confirm`, { approved: 'yes' });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { message: 'approved is required and must be a boolean' } });
    });

    test('approval sends the message and completes the workflow', async () => {
      const id = await pausedWorkflow();
      expect(sendEmail).not.toHaveBeenCalled();

      const res = await server.request('POST', `/api/v1/workflows/${id}/confirm`, { approved: true });

      expect(res.status).toBe(202);
      expect(res.body).toEqual({ workflowId: id, approved: true, accepted: true });
      await waitForStatus(server.ctx, id, WorkflowStatus.Completed);
      expect(sendEmail).toHaveBeenCalledTimes(1);
      expect(sendEmail).toHaveBeenCalledWith(
        expect.objectContaining({ to: 'hr@example.com', subject: 'Application', attachments: [] }),
      );
    });

    test('rejection cancels the workflow without sending', async () => {
      const id = await pausedWorkflow();

      const res = await server.request('POST', `/api/v1/workflows/${id}/confirm`, { approved: false });

      expect(res.status).toBe(202);
      await waitForStatus(server.ctx, id, WorkflowStatus.Cancelled);
      expect(sendEmail).not.toHaveBeenCalled();
    });
  });

  test('POST /api/v1/workflows/:id/cancel cancels a planned workflow', async () => {
    const id = await plan('sess_1');

    const res = await server.request('POST', `/api/v1/workflows/${id}/cancel`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ workflow: { id, status: 'cancelled' } });
  });

  test('DELETE /api/v1/workflows/:id removes the workflow', async () => {
    const id = await plan('sess_1');

    const res = await server.request('DELETE', `/api/v1/workflows/${id}`);
    expect(res.status).toBe(204);

    const fetched = await server.request('GET', `/api/v1/workflows/${id}`);
    expect(fetched.status).toBe(404);
  });
});

describe('Workflow API rate limiting', () => {
  let provider: ScriptedProvider;
  let server: TestServer;

  beforeEach(async () => {
    provider = new ScriptedProvider();
    server = await startServer(provider, { INTENTFLOW_PLAN_RATE_LIMIT: '1' });
  });

  afterEach(async () => {
    await server.close();
  });

  test('limits workflow creation per session', async () => {
    provider.push(
      planReply([{ type: 'notification', description: 'One' }]),
      planReply([{ type: 'notification', description: 'Two' }]),
    );
    const body = (sessionId: string) => ({ intent: 'say hello', sessionId, autoRun: false });

    const first = await server.request('POST', '/api/v1/workflows', body('sess_a'));
    expect(first.status).toBe(201);
    expect(first.headers.get('ratelimit-limit')).toBe('1');
    expect(first.headers.get('ratelimit-remaining')).toBe('0');

    const second = await server.request('POST', '/api/v1/workflows', body('sess_a'));
    expect(second.status).toBe(429);
    expect(second.headers.get('retry-after')).toBe('60');
    expect(second.body).toMatchObject({
      error: {
        code: 'RATE_LIMIT.EXCEEDED',
        message: 'Rate limit exceeded. Try again in 60 seconds.',
        retryable: true,
        details: { limit: 1, windowMs: 60000 },
      },
    });

    const other = await server.request('POST', '/api/v1/workflows', body('sess_b'));
    expect(other.status).toBe(201);
    expect(provider.calls).toHaveLength(2);
  });
});
