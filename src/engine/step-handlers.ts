/**
 * Step handlers — one per step type.
 *
 * STEP_HANDLERS is keyed by StepType, so adding a type without a handler
 * is a compile error. Handlers receive already-resolved parameters and
 * return the step's result; they never touch the store.
 */

import { AttachmentRef, ExpectedOutputFormat, Step, StepType } from '../domain/workflow';
import { createTypedError, TypedError } from '../domain/errors';
import { normalizeAttachments } from '../domain/attachments';
import { CompletionProvider } from '../llm/provider';
import {
  conformToFormat,
  extractLabeledFields,
  parseStructuredResponse,
  StructuredParseError,
} from '../llm/structured-response';
import { ToolRegistry } from '../tools/registry';
import { DEFAULT_OUTPUT_FORMAT } from '../planner/plan-validator';
import { ExecutionContext } from './context-resolver';
import { NonRetryableStepError } from './retry';

export interface StepHandlerDeps {
  tools: ToolRegistry;
  /** Completion provider for analysis, decisions and delegated tools. */
  provider: CompletionProvider;
  /** Outbound-communication tools, prepared now and sent on approval. */
  confirmationTools: readonly string[];
  /** Append a user-facing status entry; never throws. */
  notify: (sessionId: string, message: string) => Promise<void>;
}

/** Everything a handler needs for one attempt. */
export interface StepInvocation {
  workflowId: string;
  sessionId: string;
  step: Step;
  /** Parameters with placeholders already substituted. */
  parameters: Record<string, unknown>;
  /** Description with placeholders substituted where possible. */
  description: string;
  context: ExecutionContext;
}

export type StepHandler = (invocation: StepInvocation, deps: StepHandlerDeps) => Promise<unknown>;

/** The provider answered, but with none of the fields the step declared. */
export class IncompleteResponseError extends Error {
  public readonly typedError: TypedError;

  constructor(fields: string[], stepNumber: number) {
    super(`Response does not contain any of the expected fields: ${fields.join(', ')}`);
    this.name = 'IncompleteResponseError';
    this.typedError = createTypedError({
      code: 'STEP.INCOMPLETE_RESPONSE',
      message: this.message,
      stepNumber,
      retryable: true,
      details: { fields },
    });
  }
}

const MAX_CONTEXT_CHARS = 12_000;
const BODY_PREVIEW_CHARS = 200;

// ─── tool_call ──────────────────────────────────────────────────────────────

export interface EmailDetails {
  recipient: string;
  subject: string;
  body: string;
  bodyPreview: string;
  attachments: AttachmentRef[];
  attachmentCount: number;
  readyToSend: boolean;
  preparedAt: string;
}

/** Result stored on a communication step while it waits for approval. */
export interface PreparedCommunication {
  tool: string;
  emailDetails: EmailDetails;
  parameters: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(params: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = params[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return '';
}

/** Validate and stage an outbound message without sending it. */
export function prepareCommunication(tool: string, parameters: Record<string, unknown>): PreparedCommunication {
  const recipient = firstString(parameters, ['to', 'recipient', 'email']);
  const subject = firstString(parameters, ['subject', 'title']);
  if (!recipient) throw new NonRetryableStepError(`Cannot prepare ${tool}: no recipient given`);
  if (!subject) throw new NonRetryableStepError(`Cannot prepare ${tool}: no subject given`);

  const body = firstString(parameters, ['body', 'message', 'content']);
  const attachments = normalizeAttachments(parameters.attachments);

  return {
    tool,
    emailDetails: {
      recipient,
      subject,
      body,
      bodyPreview: body.slice(0, BODY_PREVIEW_CHARS),
      attachments,
      attachmentCount: attachments.length,
      readyToSend: true,
      preparedAt: new Date().toISOString(),
    },
    parameters: { ...parameters, attachments },
  };
}

export function isPreparedCommunication(value: unknown): value is PreparedCommunication {
  if (!isRecord(value) || typeof value.tool !== 'string') return false;
  const details = value.emailDetails;
  return isRecord(details)
    && typeof details.recipient === 'string'
    && typeof details.subject === 'string'
    && isRecord(value.parameters);
}

/** Send a message staged by prepareCommunication. Called after approval. */
export async function sendPreparedCommunication(
  prepared: PreparedCommunication,
  deps: StepHandlerDeps,
  sessionId: string,
): Promise<Record<string, unknown>> {
  const output = await invokeTool(prepared.tool, prepared.parameters, `Send ${prepared.tool}`, deps, sessionId);
  return {
    tool: prepared.tool,
    status: 'sent',
    recipient: prepared.emailDetails.recipient,
    subject: prepared.emailDetails.subject,
    attachmentCount: prepared.emailDetails.attachmentCount,
    sentAt: new Date().toISOString(),
    output,
  };
}

async function invokeTool(
  tool: string,
  parameters: Record<string, unknown>,
  description: string,
  deps: StepHandlerDeps,
  sessionId: string,
): Promise<unknown> {
  if (deps.tools.has(tool)) {
    return deps.tools.invoke(tool, parameters);
  }
  return delegateToAgent(tool, parameters, description, deps, sessionId);
}

/** Tools with no local implementation are carried out by the completion provider. */
async function delegateToAgent(
  tool: string,
  parameters: Record<string, unknown>,
  description: string,
  deps: StepHandlerDeps,
  sessionId: string,
): Promise<Record<string, unknown>> {
  const output = await deps.provider.complete(
    `Use the tool "${tool}" to accomplish this task: ${description}\n\nParameters:\n${JSON.stringify(parameters, null, 2)}\n\nReport the tool's result.`,
    {
      systemPrompt: 'You are an agent that carries out tool calls and reports their results as concisely as possible.',
      sessionId,
    },
  );
  return { tool, output };
}

const toolCall: StepHandler = async (invocation, deps) => {
  const { step, parameters, description, sessionId } = invocation;
  const tool = step.toolName;
  if (!tool) {
    throw new NonRetryableStepError(`Step ${step.stepNumber} is a tool_call without a tool`);
  }
  if (step.requiresConfirmation && deps.confirmationTools.includes(tool)) {
    return prepareCommunication(tool, parameters);
  }
  return invokeTool(tool, parameters, description, deps, sessionId);
};

// ─── analysis / decision ────────────────────────────────────────────────────

function renderContext(context: ExecutionContext): string {
  const text = JSON.stringify(context, null, 2);
  return text.length > MAX_CONTEXT_CHARS ? `${text.slice(0, MAX_CONTEXT_CHARS)}\n...(truncated)` : text;
}

export function buildReasoningPrompt(
  type: 'analysis' | 'decision',
  description: string,
  parameters: Record<string, unknown>,
  context: ExecutionContext,
  format: ExpectedOutputFormat,
): string {
  const fields = Object.entries(format.fields).map(([name, fieldType]) => `  "${name}": ${fieldType}`).join(',\n');
  const task = type === 'decision' ? 'Make this decision' : 'Perform this analysis';
  const params = Object.keys(parameters).length > 0
    ? `\n\nInputs:\n${JSON.stringify(parameters, null, 2)}`
    : '';

  return `${task}: ${description}${params}

Results of the previous steps:
${renderContext(context)}

Respond with a single JSON object with these fields:
{
${fields}
}`;
}

function reasoning(type: 'analysis' | 'decision'): StepHandler {
  return async (invocation, deps) => {
    const { step, parameters, description, context, sessionId } = invocation;
    const format = step.expectedOutputFormat ?? DEFAULT_OUTPUT_FORMAT;
    const fieldNames = Object.keys(format.fields);

    const content = await deps.provider.complete(
      buildReasoningPrompt(type, description, parameters, context, format),
      {
        systemPrompt: 'You extract structured information from workflow results. Answer with JSON only.',
        json: true,
        sessionId,
      },
    );

    let data: Record<string, unknown>;
    try {
      data = parseStructuredResponse(content);
    } catch (err) {
      if (!(err instanceof StructuredParseError)) throw err;
      data = extractLabeledFields(content, fieldNames);
      // A lone generic field takes the whole answer.
      if (Object.keys(data).length === 0 && fieldNames.length === 1 && fieldNames[0] === 'result' && content.trim()) {
        data = { result: content.trim() };
      }
    }

    const conformed = conformToFormat(data, format);
    if (fieldNames.length > 0 && conformed.missing.length === fieldNames.length) {
      throw new IncompleteResponseError(fieldNames, step.stepNumber);
    }
    return conformed.data;
  };
}

// ─── notification ───────────────────────────────────────────────────────────

const notification: StepHandler = async (invocation, deps) => {
  await deps.notify(invocation.sessionId, invocation.description);
  return {
    message: invocation.description,
    notifiedAt: new Date().toISOString(),
  };
};

export const STEP_HANDLERS: Record<StepType, StepHandler> = {
  tool_call: toolCall,
  analysis: reasoning('analysis'),
  decision: reasoning('decision'),
  notification,
};
