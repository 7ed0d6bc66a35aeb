import { loadAuthSettings } from "../config/auth-settings.js";
import { loadServerSettings, type ServerSettings } from "../config/server-settings.js";
import { createEchoAgent } from "../entities/echo-agent.js";
import { InMemoryEntityRegistry, type EntityDiscovery } from "../entities/registry.js";
import type { RegisteredEntity } from "../entities/types.js";
import { InMemoryConversationStore, type ConversationStore } from "../store/conversation-store.js";
import type { AuthSettings } from "../types/auth.js";
import { createLogger, type Logger } from "../../lib/logger.js";
import { executionContext, type ExecutionContextPropagator } from "./execution-context.js";
import { LocalExecutionEngine, type ExecutionEngine } from "./execution-engine.js";
import type { FetchLike } from "./jwks-service.js";
import { StreamingAggregator } from "./streaming-aggregator.js";
import { TokenValidator } from "./token-validator.js";

export interface GatewayContext {
  settings: ServerSettings;
  authSettings: AuthSettings;
  logger: Logger;
  tokenValidator: TokenValidator;
  executionContext: ExecutionContextPropagator;
  entities: EntityDiscovery;
  conversations: ConversationStore;
  executionEngine: ExecutionEngine;
  streamingAggregator: StreamingAggregator;
}

export interface GatewayContextOptions {
  env?: Record<string, string | undefined> | undefined;
  settings?: ServerSettings | undefined;
  authSettings?: AuthSettings | undefined;
  logger?: Logger | undefined;
  /** Replaces global fetch for identity provider requests. */
  fetchFn?: FetchLike | undefined;
  fetchTimeoutMs?: number | undefined;
  entities?: RegisteredEntity[] | undefined;
  conversations?: ConversationStore | undefined;
  executionContext?: ExecutionContextPropagator | undefined;
  executionEngine?: ExecutionEngine | undefined;
}

/**
 * Wire the gateway's services. Settings not passed in are read from `env`
 * (default `process.env`) and throw `ConfigurationError` when incomplete.
 */
export function createGatewayContext(options?: GatewayContextOptions): GatewayContext {
  const env = options?.env ?? process.env;
  const settings = options?.settings ?? loadServerSettings(env);
  const authSettings = options?.authSettings ?? loadAuthSettings(env);
  const logger = options?.logger ?? createLogger({ level: settings.logLevel });

  const tokenValidator = new TokenValidator(authSettings, {
    fetchFn: options?.fetchFn,
    fetchTimeoutMs: options?.fetchTimeoutMs,
    logger
  });
  const propagator = options?.executionContext ?? executionContext;
  const entities = new InMemoryEntityRegistry(options?.entities ?? [createEchoAgent()], logger);
  const conversations = options?.conversations ?? new InMemoryConversationStore();
  const executionEngine =
    options?.executionEngine ?? new LocalExecutionEngine(entities, conversations, propagator, logger);
  const streamingAggregator = new StreamingAggregator(logger);

  return {
    settings,
    authSettings,
    logger,
    tokenValidator,
    executionContext: propagator,
    entities,
    conversations,
    executionEngine,
    streamingAggregator
  };
}
