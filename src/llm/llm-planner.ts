/**
 * LLM-backed Planner — asks a completion provider to decompose an intent
 * into steps.
 *
 * The response is untrusted: it goes through parseStructuredResponse() and
 * validatePlan() before anything is persisted, and a plan that fails
 * either is rejected as a whole.
 */

import { v4 as uuid } from 'uuid';
import { Planner, PlannedStep, PlanParseError, InvalidPlanError } from '../planner/interface';
import { validatePlan } from '../planner/plan-validator';
import { mergeToolCatalog, renderToolCatalog } from '../planner/tool-catalog';
import { Step, StepStatus, STEP_TYPES, Workflow, WorkflowStatus } from '../domain/workflow';
import { errorMessage, validationError } from '../domain/errors';
import { WorkflowStore } from '../storage/store';
import { StatusReporter } from '../status/status-reporter';
import { ToolDefinition } from '../tools/registry';
import { CompletionProvider } from './provider';
import { parseStructuredResponse, StructuredParseError } from './structured-response';
import { createLogger } from '../logger';

const log = createLogger({ component: 'llm-planner' });

/** Configuration for the LLM planner. */
export interface LLMPlannerConfig {
  /** Tools whose steps always require confirmation. */
  confirmationTools: string[];
  /** Temperature for generation (lower = more deterministic). */
  temperature?: number;
  maxTokens?: number;
  /** Tools offered in addition to the built-in catalog. */
  tools?: () => ToolDefinition[];
}

export function buildSystemPrompt(tools: ToolDefinition[], confirmationTools: string[]): string {
  return `You are a planning engine that turns a user's request into an ordered list of steps.

CRITICAL: Your entire response must be a single valid JSON object. No markdown, no explanation text.

Available tools:
${renderToolCatalog(tools)}

Step types: ${STEP_TYPES.join(', ')}
- tool_call: calls one tool; "tool" and "parameters" are required.
- analysis: reads earlier results and extracts the fields listed in "output_format".
- decision: chooses between options using earlier results; declare its fields in "output_format".
- notification: a message to the user in "description".

Reference an earlier step's result with {{step_N.result.field}}, where N is that step's position (starting at 1).
Only reference steps that come before the current one. Use {{a|b|"default"}} to fall back between candidates.
Any field a later step references must be listed in the earlier step's "output_format".
Steps using ${confirmationTools.join(', ') || 'outbound communication tools'} must set "requires_confirmation": true.

Respond with:
{
  "steps": [
    {
      "type": "tool_call|analysis|decision|notification",
      "description": "string",
      "tool": "string (tool_call only)",
      "parameters": {},
      "requires_confirmation": false,
      "output_format": { "type": "object", "fields": { "name": "string|number|boolean|array|object" } }
    }
  ]
}

If the request cannot be served with these tools, respond with {"error": "unsupported", "message": "why"}.`;
}

export class LLMPlanner implements Planner {
  private readonly config: LLMPlannerConfig;

  constructor(
    private readonly provider: CompletionProvider,
    private readonly store: WorkflowStore,
    private readonly reporter: StatusReporter,
    config: LLMPlannerConfig,
  ) {
    this.config = config;
  }

  async createWorkflow(intent: string, sessionId: string): Promise<Workflow> {
    const trimmed = intent.trim();
    if (!trimmed) {
      throw new InvalidPlanError('Intent must not be empty', [validationError('Intent must not be empty')]);
    }

    const plog = log.child({ sessionId });
    await this.reporter.append(sessionId, 'Planning workflow...');

    let steps: PlannedStep[];
    try {
      steps = await this.plan(trimmed, sessionId);
    } catch (err) {
      plog.warn('Planning failed', { error: errorMessage(err) });
      await this.reporter.append(sessionId, `Planning failed: ${errorMessage(err)}`);
      throw err;
    }

    const now = new Date().toISOString();
    const workflow: Workflow = {
      id: `wf_${uuid()}`,
      sessionId,
      userIntent: trimmed,
      status: WorkflowStatus.Created,
      currentStep: null,
      steps: steps.map((planned): Step => ({ ...planned, status: StepStatus.Pending, attempts: 0 })),
      createdAt: now,
      updatedAt: now,
    };

    const created = await this.store.create(workflow);
    log.forWorkflow(created).info('Workflow planned', { steps: created.steps.length });
    await this.reporter.append(sessionId, `Plan ready: ${created.steps.length} steps`);
    return created;
  }

  private async plan(intent: string, sessionId: string): Promise<PlannedStep[]> {
    const tools = mergeToolCatalog(this.config.tools?.() ?? []);
    const content = await this.provider.complete(
      [{ role: 'user', content: `Create a plan for this request:\n\n${intent}` }],
      {
        systemPrompt: buildSystemPrompt(tools, this.config.confirmationTools),
        temperature: this.config.temperature ?? 0.2,
        maxTokens: this.config.maxTokens ?? 4096,
        json: true,
        sessionId,
      },
    );

    let raw: Record<string, unknown>;
    try {
      raw = parseStructuredResponse(content, { requiredKey: 'steps' });
    } catch (err) {
      if (!(err instanceof StructuredParseError)) throw err;
      // A refusal carries "error" instead of "steps".
      raw = parseRefusal(content) ?? rethrowAsPlanParse(err);
    }

    const result = validatePlan(raw, { confirmationTools: this.config.confirmationTools });
    for (const warning of result.warnings) {
      log.debug('Plan normalized', { sessionId, warning });
    }
    if (!result.valid) {
      const summary = result.errors.map((e) => e.message).join('; ');
      throw new InvalidPlanError(`Invalid plan: ${summary}`, result.errors);
    }
    return result.steps;
  }
}

function parseRefusal(content: string): Record<string, unknown> | null {
  try {
    return parseStructuredResponse(content, { requiredKey: 'error' });
  } catch (err) {
    if (err instanceof StructuredParseError) return null;
    throw err;
  }
}

function rethrowAsPlanParse(err: StructuredParseError): never {
  throw new PlanParseError(`Could not read a plan from the provider response: ${err.message}`, err.rawResponse);
}
