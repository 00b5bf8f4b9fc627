import { randomUUID } from 'node:crypto';
import pino from 'pino';
import type { FollowUp, HandlerOutcome, HandlerResult, TaskDescriptor } from './taskTypes.js';

const logger = pino({ name: 'WorkflowEngine' });

/**
 * Runs one handler for a task and reports how it went. Must not reject:
 * failures come back as `error` or `timeout` outcomes.
 */
export type InvokeHandler = (
  handler: string,
  task: Readonly<TaskDescriptor>,
  previous: HandlerResult | undefined,
  signal: AbortSignal
) => Promise<HandlerOutcome>;

export interface WorkflowEngineOptions {
  invoke: InvokeHandler;
  /** Deepest follow-up level a hierarchical workflow may reach. */
  maxDepth: number;
}

export function freezeTask(task: TaskDescriptor): Readonly<TaskDescriptor> {
  Object.freeze(task.parameters);
  Object.freeze(task.secondaryHandlers);
  return Object.freeze(task);
}

/**
 * Build the frozen child descriptor a follow-up asks for.
 */
export function followUpTask(parent: Readonly<TaskDescriptor>, followUp: FollowUp): Readonly<TaskDescriptor> {
  const [primaryHandler, ...secondaryHandlers] = followUp.handlers;
  return freezeTask({
    id: randomUUID(),
    originText: parent.originText,
    intent: followUp.intent,
    confidence: parent.confidence,
    parameters: { ...followUp.parameters },
    workflow: followUp.workflow ?? 'hierarchical',
    primaryHandler: primaryHandler ?? parent.primaryHandler,
    secondaryHandlers,
    sessionId: parent.sessionId,
    depth: parent.depth + 1,
    parentId: parent.id,
  });
}

/**
 * Executes a task's handlers under its workflow pattern and returns every
 * outcome, in dispatch order.
 */
export class WorkflowEngine {
  private readonly invoke: InvokeHandler;
  private readonly maxDepth: number;

  constructor(options: WorkflowEngineOptions) {
    this.invoke = options.invoke;
    this.maxDepth = options.maxDepth;
  }

  run(task: Readonly<TaskDescriptor>, signal: AbortSignal): Promise<HandlerOutcome[]> {
    switch (task.workflow) {
      case 'parallel':
        return this.parallel(task, signal);
      case 'hierarchical':
        return this.hierarchical(task, signal);
      default:
        return this.sequential(task, signal);
    }
  }

  /**
   * Handlers in declared order, each seeing the previous result. The first
   * failure stops the chain.
   */
  private async sequential(task: Readonly<TaskDescriptor>, signal: AbortSignal): Promise<HandlerOutcome[]> {
    const outcomes: HandlerOutcome[] = [];
    let previous: HandlerResult | undefined;

    for (const handler of [task.primaryHandler, ...task.secondaryHandlers]) {
      const outcome = await this.invoke(handler, task, previous, signal);
      outcomes.push(outcome);
      if (outcome.status !== 'ok') {
        const skipped = task.secondaryHandlers.slice(outcomes.length - 1);
        if (skipped.length > 0) {
          logger.info({ taskId: task.id, failed: handler, skipped }, 'Sequential workflow stopped early');
        }
        break;
      }
      previous = outcome.result;
    }
    return outcomes;
  }

  /**
   * All handlers at once under the shared signal; each outcome stands alone.
   */
  private parallel(task: Readonly<TaskDescriptor>, signal: AbortSignal): Promise<HandlerOutcome[]> {
    const handlers = [task.primaryHandler, ...task.secondaryHandlers];
    return Promise.all(handlers.map((handler) => this.invoke(handler, task, undefined, signal)));
  }

  /**
   * Run the chain like a sequential workflow, then dispatch whatever
   * follow-ups the successful results ask for, one level deeper each time.
   */
  private async hierarchical(task: Readonly<TaskDescriptor>, signal: AbortSignal): Promise<HandlerOutcome[]> {
    const outcomes = await this.sequential(task, signal);
    const followUps = outcomes.flatMap((outcome) =>
      outcome.status === 'ok' && outcome.result?.followUp ? [outcome.result.followUp] : []
    );

    for (const followUp of followUps) {
      if (task.depth + 1 > this.maxDepth) {
        logger.warn(
          { taskId: task.id, depth: task.depth, maxDepth: this.maxDepth, intent: followUp.intent },
          'Follow-up dropped at maximum workflow depth'
        );
        continue;
      }
      if (signal.aborted || followUp.handlers.length === 0) {
        continue;
      }
      outcomes.push(...(await this.run(followUpTask(task, followUp), signal)));
    }
    return outcomes;
  }
}
