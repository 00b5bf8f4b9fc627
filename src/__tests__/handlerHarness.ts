import { randomUUID } from 'node:crypto';
import { FactorTableEmissionsProvider } from '../collaborators/EmissionsProvider.js';
import { InMemoryCatalog } from '../collaborators/InMemoryCatalog.js';
import { createCatalogToolServer } from '../collaborators/catalogToolServer.js';
import { createEmissionsToolServer } from '../collaborators/emissionsToolServer.js';
import type { HandlerRequest, HandlerResult, IntentKind, TaskDescriptor, TaskParameters } from '../router/taskTypes.js';
import { freezeTask } from '../router/WorkflowEngine.js';
import { InMemorySessionStore } from '../session/InMemorySessionStore.js';
import { SessionService } from '../session/SessionService.js';
import { InProcessConnection } from '../transport/ToolConnection.js';
import { ToolTransportClient } from '../transport/ToolTransportClient.js';
import { CATALOG_ENDPOINT, EMISSIONS_ENDPOINT } from '../transport/toolNames.js';

/**
 * Built-in tool endpoints on the bundled data files, reached in process, plus
 * a session service on an in-memory store.
 */
export function createHarness() {
  const store = new InMemorySessionStore({ ttlSeconds: 600 });
  const transport = new ToolTransportClient({ requestTimeoutMs: 1000 })
    .addEndpoint(CATALOG_ENDPOINT, new InProcessConnection(createCatalogToolServer(InMemoryCatalog.fromDataFile(), { callTimeoutMs: 1000 })))
    .addEndpoint(
      EMISSIONS_ENDPOINT,
      new InProcessConnection(createEmissionsToolServer(FactorTableEmissionsProvider.fromDataFile(), { callTimeoutMs: 1000 }))
    );
  const sessions = new SessionService({ store, ttlSeconds: 600 });
  return { store, transport, sessions };
}

export function handlerRequest(
  intent: IntentKind,
  parameters: TaskParameters = {},
  options: { sessionId?: string; previous?: HandlerResult; originText?: string } = {}
): HandlerRequest {
  const task: TaskDescriptor = {
    id: randomUUID(),
    originText: options.originText ?? '',
    intent,
    confidence: 1,
    parameters: { ...parameters },
    workflow: 'sequential',
    primaryHandler: 'test',
    secondaryHandlers: [],
    sessionId: options.sessionId ?? 'sess-handler',
    depth: 0,
  };
  return {
    task: freezeTask(task),
    previous: options.previous,
    signal: new AbortController().signal,
  };
}
