import type { RetrievalCategory } from '@market-agent/shared/src/types/conversation.types.js';
import type { MarketDataRepository } from '../../repositories/market-data.repository.js';
import { createToolRegistry } from '../tool-registry.js';
import type { ToolRegistry } from '../tool-registry.js';
import { createConditionalTools } from './conditional-tools.js';
import { createFetchTools } from './fetch-tools.js';
import { createSignalTools } from './signal-tools.js';

export type MarketToolRegistries = Readonly<Record<RetrievalCategory, ToolRegistry>>;

/** One registry per retrieval category; each handler only sees its own tools. */
export function createMarketToolRegistries(repository: MarketDataRepository): MarketToolRegistries {
  return {
    fetch: createToolRegistry(createFetchTools(repository)),
    conditional: createToolRegistry(createConditionalTools(repository)),
    signal: createToolRegistry(createSignalTools(repository)),
  };
}
