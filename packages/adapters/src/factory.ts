import { ConfigError } from '@repairbench/shared';
import type { StrategyConfig } from '@repairbench/shared';
import type { AgentAdapter } from './adapter';
import { SubprocessAgentAdapter } from './subprocess/adapter';
import { ReplayAgentAdapter } from './replay/adapter';

/**
 * Builds the adapter for a configured strategy.
 */
export function createAgentAdapter(name: string, config: StrategyConfig): AgentAdapter {
  switch (config.type) {
    case 'subprocess':
      return new SubprocessAgentAdapter(name, config);
    case 'replay':
      return new ReplayAgentAdapter(name, config);
  }
}

/**
 * Resolves strategy names against the configured strategies.
 *
 * @throws ConfigError when a name is not configured
 */
export function createAgentAdapters(
  names: readonly string[],
  strategies: Readonly<Record<string, StrategyConfig>>,
): AgentAdapter[] {
  return names.map((name) => {
    const config = strategies[name];
    if (!config) {
      const known = Object.keys(strategies);
      throw new ConfigError(
        `Unknown strategy '${name}'. Configured strategies: ${known.length > 0 ? known.join(', ') : '(none)'}`,
      );
    }
    return createAgentAdapter(name, config);
  });
}
