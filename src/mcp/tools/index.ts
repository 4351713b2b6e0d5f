import { ToolRegistry } from '../registry';
import { ExploreArgsSchema, SearchArgsSchema, SummarizeArgsSchema } from '../schemas/researchSchemas';
import { exploreDefinition, searchDefinition, summarizeDefinition } from './researchTools';

export function createToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(searchDefinition, SearchArgsSchema);
  registry.register(summarizeDefinition, SummarizeArgsSchema);
  registry.register(exploreDefinition, ExploreArgsSchema);
  return registry;
}

export * from './researchTools';
