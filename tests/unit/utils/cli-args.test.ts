/**
 * CLI Argument Parsing Tests
 */
import { describe, it, expect } from 'vitest';
import { parseCliArgs, verbosityToLogLevel } from '../../../src/utils/cli-args';
import { AppError } from '../../../src/utils/app-error';

describe('parseCliArgs', () => {
  it('should parse short flags', () => {
    expect(parseCliArgs(['-i', 'in.docx', '-o', 'out.docx', '-v', '5'])).toEqual({
      kind: 'run',
      options: { input: 'in.docx', output: 'out.docx', verbose: 5 },
    });
  });

  it('should parse long flags with = values', () => {
    expect(parseCliArgs(['--input=in.docx', '--verbose=2'])).toEqual({
      kind: 'run',
      options: { input: 'in.docx', verbose: 2 },
    });
  });

  it('should default verbosity to 3 and leave the output unset', () => {
    const command = parseCliArgs(['--input', 'paper.docx']);
    expect(command).toEqual({ kind: 'run', options: { input: 'paper.docx', verbose: 3 } });
  });

  it('should recognise help and version', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-i', 'x.docx', '--version'])).toEqual({ kind: 'version' });
  });

  it('should require an input file', () => {
    expect(() => parseCliArgs([])).toThrow(/An input file is required/);
  });

  it('should reject unknown arguments with a usage error', () => {
    let caught: unknown;
    try {
      parseCliArgs(['-i', 'x.docx', '--fast']);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({ code: 'INVALID_ARGUMENTS', exitCode: 2 });
  });

  it('should reject a flag without a value', () => {
    expect(() => parseCliArgs(['-i'])).toThrow(/Missing value for -i/);
  });

  it('should reject verbosity outside 0-5', () => {
    expect(() => parseCliArgs(['-i', 'x.docx', '-v', '9'])).toThrow(/between 0 and 5/);
    expect(() => parseCliArgs(['-i', 'x.docx', '-v', 'loud'])).toThrow(AppError);
  });
});

describe('verbosityToLogLevel', () => {
  it('should map verbosity numbers to log levels', () => {
    expect([0, 1, 2, 3, 4, 5].map(verbosityToLogLevel)).toEqual(['error', 'error', 'warn', 'info', 'debug', 'trace']);
  });
});
