import type { Capability, ToolRegistry } from './types';

export function createToolRegistry(capabilities: Capability[] = []): ToolRegistry {
  // Map keeps insertion order, which fixes the tool order in the prompt
  const tools = new Map<string, Capability>();

  const registry: ToolRegistry = {
    register(capability) {
      if (tools.has(capability.name)) {
        throw new Error(`tool already registered: ${capability.name}`);
      }
      tools.set(capability.name, capability);
    },
    get(name) {
      return tools.get(name);
    },
    has(name) {
      return tools.has(name);
    },
    list() {
      return Array.from(tools.values());
    },
  };

  for (const capability of capabilities) registry.register(capability);
  return registry;
}
