import { ConfigError } from '@repairbench/shared';
import { createAgentAdapters } from './factory';
import { ReplayAgentAdapter } from './replay/adapter';
import { SubprocessAgentAdapter } from './subprocess/adapter';

describe('createAgentAdapters', () => {
  const strategies = {
    react: { type: 'subprocess' as const, command: 'agent', args: [], envAllowlist: [] },
    baseline: { type: 'replay' as const, dir: 'recordings' },
  };

  it('builds adapters in the requested order', () => {
    const adapters = createAgentAdapters(['baseline', 'react'], strategies);
    expect(adapters.map((a) => a.id())).toEqual(['baseline', 'react']);
    expect(adapters[0]).toBeInstanceOf(ReplayAgentAdapter);
    expect(adapters[1]).toBeInstanceOf(SubprocessAgentAdapter);
  });

  it('rejects unknown strategy names', () => {
    expect(() => createAgentAdapters(['nope'], strategies)).toThrow(ConfigError);
    expect(() => createAgentAdapters(['nope'], strategies)).toThrow(
      "Unknown strategy 'nope'. Configured strategies: react, baseline",
    );
  });
});
