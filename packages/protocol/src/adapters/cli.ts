import { ProtocolError } from '../errors.js';
import { errorMessageOf } from '../response.js';
import { OUTPUT_FORMATS, type OutputFormat, type UnifiedRequest, type UnifiedResponse } from '../types.js';

export type CliFlagValue = string | boolean | string[];

export interface CliInvocation {
  /** Command words, e.g. `['analyze', 'complexity']`. */
  command: string[];
  /** The raw arguments after the command words. */
  args: string[];
  /** Parsed flags keyed by their long name, e.g. `project-path`. */
  flags: Record<string, CliFlagValue>;
}

export interface CliOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

const LIST_COMMANDS: Record<string, string> = {
  list: '/api/v1/templates',
  templates: '/api/v1/templates'
};

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function flagNameToKey(name: string): string {
  return name.replace(/-/g, '_');
}

function resolvePath(command: readonly string[]): { method: 'GET' | 'POST'; path: string } {
  const [head, sub] = command;
  if (head === 'analyze' && sub) {
    return { method: 'POST', path: `/api/v1/analyze/${sub}` };
  }
  const listPath = head ? LIST_COMMANDS[head] : undefined;
  if (listPath) {
    return { method: 'GET', path: listPath };
  }
  throw new ProtocolError('Decode', `Unknown command: ${command.join(' ') || '(none)'}`);
}

export function decodeCli(invocation: CliInvocation): UnifiedRequest {
  const { method, path } = resolvePath(invocation.command);
  const body: Record<string, CliFlagValue> = {};
  for (const [name, value] of Object.entries(invocation.flags)) {
    body[flagNameToKey(name)] = value;
  }
  const format = body.format;

  return {
    method,
    path,
    body: JSON.stringify(body),
    headers: { 'content-type': 'application/json' },
    extensions: {
      protocol: 'Cli',
      outputFormat: isOutputFormat(format) ? format : 'json',
      cliContext: { command: invocation.command.join(' '), args: invocation.args }
    }
  };
}

/** 2xx/3xx print to stdout and exit 0; 4xx exits 1 and 5xx exits 2 with the message on stderr. */
export function encodeCli(response: UnifiedResponse): CliOutput {
  if (response.status < 400) {
    return { exitCode: 0, stdout: response.body, stderr: '' };
  }
  return {
    exitCode: response.status < 500 ? 1 : 2,
    stdout: '',
    stderr: errorMessageOf(response)
  };
}
