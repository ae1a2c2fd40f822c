import type { RunState } from '@repairbench/shared';
import { ScenarioRun } from './state';

describe('ScenarioRun', () => {
  it('follows the happy path and reports transitions', () => {
    const seen: Array<[RunState, RunState]> = [];
    const run = new ScenarioRun('s1', 'react', (from, to) => seen.push([from, to]));

    run.transition('Dispatched');
    run.transition('PatchReceived');
    run.transition('Executed');
    run.transition('Verdicted');

    expect(run.state).toBe('Verdicted');
    expect(seen).toEqual([
      ['Queued', 'Dispatched'],
      ['Dispatched', 'PatchReceived'],
      ['PatchReceived', 'Executed'],
      ['Executed', 'Verdicted'],
    ]);
  });

  it('allows a cancelled execution to time out', () => {
    const run = new ScenarioRun('s1', 'react');
    run.transition('Dispatched');
    run.transition('PatchReceived');
    run.transition('TimedOut');
    expect(run.state).toBe('TimedOut');
    expect(() => run.transition('Verdicted')).toThrow('Illegal transition TimedOut -> Verdicted');
  });

  it('throws on illegal transitions', () => {
    const run = new ScenarioRun('s1', 'react');
    expect(() => run.transition('Executed')).toThrow('Illegal transition Queued -> Executed for s1/react');

    run.transition('Dispatched');
    run.transition('Refused');
    expect(() => run.transition('Verdicted')).toThrow('Illegal transition Refused -> Verdicted');
    expect(run.state).toBe('Refused');
  });
});
