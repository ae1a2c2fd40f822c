import { decodeAgentOutput, parseAgentResponse, toFileEdits } from './protocol';

describe('decodeAgentOutput', () => {
  it('parses a JSON document', () => {
    expect(decodeAgentOutput('{"refusal":"no"}\n')).toEqual({ refusal: 'no' });
  });

  it('falls back to the last line after log output', () => {
    expect(decodeAgentOutput('thinking...\nstill thinking\n{"refusal":"no"}\n')).toEqual({
      refusal: 'no',
    });
  });

  it('throws on empty or non-JSON output', () => {
    expect(() => decodeAgentOutput('   ')).toThrow('agent produced no output');
    expect(() => decodeAgentOutput('not json')).toThrow(SyntaxError);
  });
});

describe('parseAgentResponse', () => {
  it('accepts each response shape', () => {
    expect(parseAgentResponse({ edits: [{ path: 'a', content: '' }] }).success).toBe(true);
    expect(parseAgentResponse({ refusal: 'r' }).success).toBe(true);
    expect(parseAgentResponse({ error: 'e' }).success).toBe(true);
  });

  it('describes responses that match no shape', () => {
    const result = parseAgentResponse({ patch: 'x' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.message).toMatch(/^invalid agent response/);
  });
});

describe('toFileEdits', () => {
  it('tags write and diff edits', () => {
    expect(toFileEdits([{ path: 'a', content: 'x' }, { path: 'b', diff: 'd' }])).toEqual([
      { kind: 'write', path: 'a', content: 'x' },
      { kind: 'diff', path: 'b', diff: 'd' },
    ]);
  });
});
