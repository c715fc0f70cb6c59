import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  InvalidArgumentError,
  UsageError,
  RepositoryNotFoundError,
  InvalidRepositoryError,
  DirectoryNotFoundError,
  CloneError,
  ManifestParseError,
  ProcessError,
  errnoCode,
  toError,
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
    const error = new AppError('CloneError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('ProcessError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('ConfigError', () => {
  it('should create a ConfigError with correct code', () => {
    const error = new ConfigError('Invalid config');
    expect(error.code).toBe('ConfigError');
    expect(error.name).toBe('ConfigError');
  });
});

describe('InvalidArgumentError', () => {
  it('is a ConfigError that names the argument', () => {
    const error = new InvalidArgumentError('style', 'Unsupported tree style: tabular');
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.code).toBe('ConfigError');
    expect(error.argument).toBe('style');
    expect(error.name).toBe('InvalidArgumentError');
  });
});

describe('UsageError', () => {
  it('should create a UsageError with correct code', () => {
    expect(new UsageError('Invalid usage').code).toBe('UsageError');
  });
});

describe('repository errors', () => {
  it('use the NotFound and InvalidRepository codes', () => {
    expect(new RepositoryNotFoundError('Path does not exist: /x').code).toBe('NotFound');
    expect(new InvalidRepositoryError('Path is not a directory: /x').code).toBe(
      'InvalidRepository',
    );
  });

  it('formats directory and clone messages', () => {
    const dir = new DirectoryNotFoundError('nonexistent');
    expect(dir.code).toBe('DirectoryNotFound');
    expect(dir.message).toBe('Directory not found: nonexistent');
    expect(dir.directory).toBe('nonexistent');

    const clone = new CloneError('https://example.com/r.git', { cause: new Error('auth') });
    expect(clone.code).toBe('CloneError');
    expect(clone.message).toBe('Failed to clone repository: https://example.com/r.git');
    expect(clone.source).toBe('https://example.com/r.git');
  });
});

describe('ManifestParseError', () => {
  it('prefixes the manifest path', () => {
    const error = new ManifestParseError('pyproject.toml', 'invalid TOML');
    expect(error.code).toBe('ParseFailure');
    expect(error.message).toBe('pyproject.toml: invalid TOML');
    expect(error.manifest).toBe('pyproject.toml');
  });
});

describe('ProcessError', () => {
  it('should accept exitCode option', () => {
    const error = new ProcessError('Process failed', { exitCode: 128 });
    expect(error.code).toBe('ProcessError');
    expect(error.exitCode).toBe(128);
  });
});

describe('helpers', () => {
  it('extracts errno codes', () => {
    expect(errnoCode(Object.assign(new Error('busy'), { code: 'EBUSY' }))).toBe('EBUSY');
    expect(errnoCode(new Error('plain'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });

  it('wraps non-errors', () => {
    const original = new Error('x');
    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});
