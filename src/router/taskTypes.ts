import type { ErrorEnvelope } from '../http/errorEnvelope.js';
import type { SessionSnapshot } from '../session/sessionTypes.js';

export const INTENT_KINDS = [
  'cart_add',
  'cart_remove',
  'cart_view',
  'cart_clear',
  'shipping_select',
  'shipping_options',
  'checkout',
  'payment',
  'footprint',
  'compare',
  'product_search',
  'general',
] as const;

export type IntentKind = (typeof INTENT_KINDS)[number];

export function isIntentKind(value: string): value is IntentKind {
  return INTENT_KINDS.some((kind) => kind === value);
}

export type WorkflowPattern = 'sequential' | 'parallel' | 'hierarchical';

/**
 * Parameters the classifier can pull out of a message. Handlers read only
 * the ones their intent needs.
 */
export interface TaskParameters {
  query?: string;
  productId?: string;
  productRef?: string;
  productIds?: string[];
  quantity?: number;
  shippingMethod?: string;
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  [key: string]: unknown;
}

/**
 * One unit of routed work. Frozen before dispatch.
 */
export interface TaskDescriptor {
  id: string;
  originText: string;
  intent: IntentKind;
  confidence: number;
  parameters: TaskParameters;
  workflow: WorkflowPattern;
  primaryHandler: string;
  secondaryHandlers: string[];
  sessionId: string;
  /** 0 for classifier output, +1 for each hierarchical follow-up level. */
  depth: number;
  parentId?: string;
}

export interface SessionContext {
  sessionId: string;
  cartItemCount: number;
  lifecycle: SessionSnapshot['lifecycle'];
}

/**
 * Request from a handler's result for more work on a synthesized task.
 */
export interface FollowUp {
  intent: IntentKind;
  parameters: TaskParameters;
  handlers: string[];
  workflow?: WorkflowPattern;
}

export interface HandlerResult {
  /** One human-readable line describing what happened. */
  summary: string;
  data: Record<string, unknown>;
  /** Session state after the handler ran, when it touched the session. */
  session?: SessionSnapshot;
  followUp?: FollowUp;
}

export interface HandlerRequest {
  task: Readonly<TaskDescriptor>;
  /** Result of the previous handler in a sequential chain. */
  previous?: HandlerResult;
  signal: AbortSignal;
}

/**
 * A task-domain handler the router can dispatch to.
 */
export interface TaskHandler {
  readonly name: string;
  readonly description: string;
  /** Intent kinds this handler can serve as primary. */
  readonly capabilities: readonly string[];
  handle(request: HandlerRequest): Promise<HandlerResult>;
}

export type HandlerOutcomeStatus = 'ok' | 'error' | 'timeout';

export interface HandlerOutcome {
  handler: string;
  taskId: string;
  depth: number;
  status: HandlerOutcomeStatus;
  attempts: number;
  durationMs: number;
  result?: HandlerResult;
  error?: ErrorEnvelope;
}

export type AggregateStatus = 'ok' | 'partial' | 'failed';

export interface AggregatedResult {
  taskId: string;
  intent: IntentKind;
  workflow: WorkflowPattern;
  status: AggregateStatus;
  /** Successful and failed outcomes, in dispatch order. Timed-out calls are left out. */
  results: HandlerOutcome[];
  /** Handlers that timed out on this request. */
  degraded: string[];
  /** Handlers that returned an error on this request. */
  failed: string[];
  /** Why the aggregate is not ok. */
  error?: ErrorEnvelope;
  /** Non-fatal notes, such as a low-confidence classification. */
  notes: ErrorEnvelope[];
}
