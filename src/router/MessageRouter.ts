import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { AppError } from '../errors/AppError.js';
import { mapError, sanitizeForLogging } from '../errors/mapError.js';
import { appErrorToEnvelope, type ErrorEnvelope } from '../http/errorEnvelope.js';
import { retryAsync } from '../http/retry.js';
import { isTransientError } from '../http/retryPolicy.js';
import { linkSignals, withTimeout } from '../http/timeout.js';
import type { CapabilityRegistry } from '../registry/CapabilityRegistry.js';
import type { RegistrationHooks } from '../registry/capabilityTypes.js';
import type { SessionService } from '../session/SessionService.js';
import type { IntentClassifier } from './IntentClassifier.js';
import { formatResponse } from './responseFormatter.js';
import {
  isIntentKind,
  type AggregatedResult,
  type HandlerOutcome,
  type HandlerResult,
  type IntentKind,
  type TaskDescriptor,
  type TaskHandler,
  type TaskParameters,
} from './taskTypes.js';
import { freezeTask, WorkflowEngine } from './WorkflowEngine.js';

const logger = pino({ name: 'MessageRouter' });

export interface RouterRetryOptions {
  /** Retries after the first attempt. */
  maxAttempts: number;
  baseDelayMs: number;
  jitterMs: number;
}

export interface MessageRouterOptions {
  registry: CapabilityRegistry;
  classifier: IntentClassifier;
  sessions: SessionService;
  handlerTimeoutMs: number;
  requestDeadlineMs: number;
  maxWorkflowDepth: number;
  retry: RouterRetryOptions;
  /** Include error details in aggregates. */
  debug?: boolean;
}

export interface DispatchOptions {
  /** Caller's signal, usually tied to the HTTP request. */
  signal?: AbortSignal;
  /** Overrides the configured request deadline. */
  deadlineMs?: number;
}

/**
 * Direct task for `send`, bypassing the rule table for handler choice.
 */
export interface DirectTask {
  message?: string;
  sessionId?: string;
  intent?: string;
  parameters?: TaskParameters;
}

export interface MessageReply {
  response: string;
  sessionId: string;
  intent: IntentKind;
  result: AggregatedResult;
}

/** The request deadline fired, as opposed to the caller going away. */
function deadlineExpired(signal: AbortSignal): boolean {
  return signal.aborted && signal.reason instanceof Error && signal.reason.name === 'TimeoutError';
}

function defaultHooks(name: string): RegistrationHooks {
  return {
    receive: async (message) => ({ handler: name, received: message.type }),
  };
}

/**
 * Message router: classifies a request, picks handlers from the capability
 * registry and runs them under the task's workflow with retry and deadlines.
 *
 * Routing problems and handler failures end up in the returned aggregate;
 * `dispatch`, `send` and `handleMessage` do not throw for them.
 */
export class MessageRouter {
  private readonly handlers = new Map<string, TaskHandler>();
  private readonly engine: WorkflowEngine;

  constructor(private readonly options: MessageRouterOptions) {
    this.engine = new WorkflowEngine({
      maxDepth: options.maxWorkflowDepth,
      invoke: (handler, task, previous, signal) => this.invokeHandler(handler, task, previous, signal),
    });
  }

  /**
   * Make a handler dispatchable and publish its capability card.
   */
  register(handler: TaskHandler, hooks: RegistrationHooks = defaultHooks(handler.name)): this {
    this.handlers.set(handler.name, handler);
    this.options.registry.register(
      { name: handler.name, description: handler.description, capabilities: [...handler.capabilities] },
      hooks
    );
    return this;
  }

  unregister(name: string): boolean {
    this.handlers.delete(name);
    return this.options.registry.unregister(name);
  }

  handlerNames(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Classify `text`, dispatch it and render a reply.
   */
  async handleMessage(text: string, sessionId: string, options: DispatchOptions = {}): Promise<MessageReply> {
    const session = await this.options.sessions.view(sessionId);
    const descriptor = this.options.classifier.classify(text, {
      sessionId,
      cartItemCount: session.cartItems.length,
      lifecycle: session.lifecycle,
    });
    const result = await this.dispatch(descriptor, options);
    return { response: formatResponse(result), sessionId, intent: descriptor.intent, result };
  }

  /**
   * Run a classified task. When the primary handler cannot take work, the
   * first routable handler declaring the intent takes its place.
   */
  dispatch(descriptor: TaskDescriptor, options: DispatchOptions = {}): Promise<AggregatedResult> {
    const primary = this.resolvePrimary(descriptor);
    if (primary instanceof AppError) {
      return Promise.resolve(this.failed(descriptor, primary));
    }
    return this.execute({ ...descriptor, primaryHandler: primary }, options);
  }

  /**
   * Dispatch straight to `handlerName` with the same retry and deadline policy.
   */
  send(handlerName: string, task: DirectTask, options: DispatchOptions = {}): Promise<AggregatedResult> {
    const handler = this.handlers.get(handlerName);
    const sessionId = task.sessionId ?? randomUUID();
    const classified = task.message
      ? this.options.classifier.classify(task.message, { sessionId, cartItemCount: 0, lifecycle: 'active' })
      : undefined;

    const declared = handler?.capabilities.filter(isIntentKind) ?? [];
    const explicit = task.intent !== undefined && isIntentKind(task.intent) ? task.intent : undefined;
    const intent =
      explicit ??
      (classified && declared.includes(classified.intent) ? classified.intent : declared[0]) ??
      'general';

    const descriptor: TaskDescriptor = {
      id: randomUUID(),
      originText: task.message ?? '',
      intent,
      confidence: 1,
      parameters: { ...classified?.parameters, ...task.parameters },
      workflow: 'sequential',
      primaryHandler: handlerName,
      secondaryHandlers: [],
      sessionId,
      depth: 0,
    };

    if (!handler || !this.options.registry.isRoutable(handlerName)) {
      return Promise.resolve(this.failed(descriptor, this.unavailable(handlerName)));
    }
    return this.execute(descriptor, options);
  }

  private resolvePrimary(descriptor: TaskDescriptor): string | AppError {
    if (this.handlers.has(descriptor.primaryHandler) && this.options.registry.isRoutable(descriptor.primaryHandler)) {
      return descriptor.primaryHandler;
    }
    const fallback = this.options.registry
      .findCapable(descriptor.intent)
      .find((card) => this.handlers.has(card.name));
    if (fallback) {
      logger.info(
        { taskId: descriptor.id, intent: descriptor.intent, wanted: descriptor.primaryHandler, using: fallback.name },
        'Primary handler unavailable; using another capable handler'
      );
      return fallback.name;
    }
    logger.warn({ taskId: descriptor.id, intent: descriptor.intent }, 'No capable handler');
    return AppError.noCapableHandler(descriptor.intent, descriptor.intent);
  }

  private async execute(descriptor: TaskDescriptor, options: DispatchOptions): Promise<AggregatedResult> {
    const task = freezeTask({
      ...descriptor,
      parameters: { ...descriptor.parameters },
      secondaryHandlers: [...descriptor.secondaryHandlers],
    });
    const deadline = AbortSignal.timeout(options.deadlineMs ?? this.options.requestDeadlineMs);
    const { signal, dispose } = linkSignals(options.signal, deadline);
    const startedAt = Date.now();

    try {
      const outcomes = await this.engine.run(task, signal);
      const result = this.aggregate(task, outcomes);
      logger.info(
        {
          taskId: task.id,
          intent: task.intent,
          workflow: task.workflow,
          status: result.status,
          degraded: result.degraded,
          failed: result.failed,
          durationMs: Date.now() - startedAt,
        },
        'Task dispatched'
      );
      return result;
    } finally {
      dispose();
    }
  }

  /**
   * One handler call: availability check, per-attempt deadline, retries on
   * transient transport errors, and registry metrics. A call that runs past
   * its deadline is never retried, since the handler may still commit.
   */
  private async invokeHandler(
    name: string,
    task: Readonly<TaskDescriptor>,
    previous: HandlerResult | undefined,
    signal: AbortSignal
  ): Promise<HandlerOutcome> {
    const base = { handler: name, taskId: task.id, depth: task.depth };
    const handler = this.handlers.get(name);
    if (!handler || !this.options.registry.isRoutable(name)) {
      return { ...base, status: 'error', attempts: 0, durationMs: 0, error: this.envelope(this.unavailable(name)) };
    }

    const { handlerTimeoutMs, retry } = this.options;
    const label = `handler ${name}`;
    const startedAt = Date.now();
    let attempts = 0;

    try {
      const result = await retryAsync(
        async () => {
          attempts++;
          try {
            return await withTimeout(
              (callSignal) => handler.handle({ task, previous, signal: callSignal }),
              handlerTimeoutMs,
              label,
              signal
            );
          } catch (error) {
            const appError = mapError(error);
            if (appError.code === 'TIMEOUT_REQUEST' && appError.details?.operation === label) {
              throw AppError.handlerTimeout(name, handlerTimeoutMs, appError);
            }
            throw appError;
          }
        },
        {
          retries: retry.maxAttempts,
          baseDelayMs: retry.baseDelayMs,
          jitter: retry.jitterMs,
          shouldRetry: (error) => isTransientError(error),
          label,
          signal,
        }
      );

      const durationMs = Date.now() - startedAt;
      this.options.registry.recordCall(name, true, durationMs);
      return { ...base, status: 'ok', attempts, durationMs, result };
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      this.options.registry.recordCall(name, false, durationMs);
      let appError = mapError(error);

      const deadlinePassed = appError.code === 'REQUEST_CANCELLED' && deadlineExpired(signal);
      if (appError.code === 'HANDLER_TIMEOUT' || deadlinePassed) {
        // Degraded for this call only; the card keeps its status until a probe says otherwise
        const timeout = appError.code === 'HANDLER_TIMEOUT' ? appError : AppError.handlerTimeout(name, durationMs, appError);
        logger.warn({ ...base, attempts, durationMs }, 'Handler timed out');
        return { ...base, status: 'timeout', attempts, durationMs, error: this.envelope(timeout) };
      }

      if (attempts > 1 && isTransientError(appError)) {
        appError = AppError.retryExhausted(label, attempts, appError);
      }
      logger.warn(
        { ...base, attempts, code: appError.code, details: sanitizeForLogging(appError.details) },
        'Handler call failed'
      );
      return { ...base, status: 'error', attempts, durationMs, error: this.envelope(appError) };
    }
  }

  private aggregate(task: Readonly<TaskDescriptor>, outcomes: HandlerOutcome[]): AggregatedResult {
    const results = outcomes.filter((outcome) => outcome.status !== 'timeout');
    const degraded = [...new Set(outcomes.filter((o) => o.status === 'timeout').map((o) => o.handler))];
    const failed = [...new Set(outcomes.filter((o) => o.status === 'error').map((o) => o.handler))];
    const firstProblem = outcomes.find((outcome) => outcome.status !== 'ok');

    return {
      taskId: task.id,
      intent: task.intent,
      workflow: task.workflow,
      status: firstProblem ? 'partial' : 'ok',
      results,
      degraded,
      failed,
      ...(firstProblem?.error ? { error: firstProblem.error } : {}),
      notes: this.notes(task),
    };
  }

  private failed(descriptor: TaskDescriptor, error: AppError): AggregatedResult {
    return {
      taskId: descriptor.id,
      intent: descriptor.intent,
      workflow: descriptor.workflow,
      status: 'failed',
      results: [],
      degraded: [],
      failed: [],
      error: this.envelope(error),
      notes: this.notes(descriptor),
    };
  }

  private notes(task: Readonly<TaskDescriptor>): ErrorEnvelope[] {
    if (task.intent === 'general' && task.confidence === 0) {
      return [this.envelope(AppError.classificationAmbiguous(task.originText))];
    }
    return [];
  }

  private unavailable(name: string): AppError {
    const status = this.options.registry.get(name)?.status;
    return AppError.handlerUnavailable(name, status ? `status ${status}` : 'not registered');
  }

  private envelope(error: AppError): ErrorEnvelope {
    return appErrorToEnvelope(error, undefined, this.options.debug ?? false);
  }
}
