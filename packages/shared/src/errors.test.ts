import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  CorpusError,
  AgentError,
  SandboxError,
  VerificationError,
  ProcessError,
  isUserCorrectable,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('AgentError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('ProcessError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('CorpusError', () => {
  it('should format missing-field errors with the scenario id', () => {
    const error = CorpusError.missingField('113', 'category');
    expect(error.message).toBe("scenario 113: missing field 'category'");
    expect(error.code).toBe('CorpusError');
    expect(error.scenarioId).toBe('113');
    expect(error.field).toBe('category');
    expect(error.name).toBe('CorpusError');
  });
});

describe('SandboxError', () => {
  it('should default to non-transient', () => {
    const error = new SandboxError('bad patch', { phase: 'patch' });
    expect(error.transient).toBe(false);
    expect(error.phase).toBe('patch');
    expect(error.code).toBe('SandboxError');
  });

  it('should carry the transient flag', () => {
    const error = new SandboxError('mkdtemp failed', { phase: 'workspace', transient: true });
    expect(error.transient).toBe(true);
  });
});

describe('error codes', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError'],
    [new UsageError('x'), 'UsageError'],
    [new AgentError('x'), 'AgentError'],
    [new VerificationError('x'), 'VerificationError'],
  ])('%s has code %s', (error, code) => {
    expect(error.code).toBe(code);
    expect(error).toBeInstanceOf(AppError);
  });

  it('ProcessError keeps the exit code', () => {
    const error = new ProcessError('failed', { exitCode: 3 });
    expect(error.exitCode).toBe(3);
  });
});

describe('isUserCorrectable', () => {
  it('should flag config, usage and corpus errors', () => {
    expect(isUserCorrectable(new ConfigError('x'))).toBe(true);
    expect(isUserCorrectable(new UsageError('x'))).toBe(true);
    expect(isUserCorrectable(new CorpusError('x'))).toBe(true);
  });

  it('should not flag runtime errors', () => {
    expect(isUserCorrectable(new SandboxError('x', { phase: 'spawn' }))).toBe(false);
    expect(isUserCorrectable(new Error('x'))).toBe(false);
  });
});
