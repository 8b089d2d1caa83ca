import { DecodingError, InvalidCommandError } from './errors.js';

/**
 * Command-line grammar shared by every dispatcher entry point.
 *
 * A command is a single string: all whitespace is removed, then the
 * remainder is split on `,`. Token 0 is the verb, the rest are positional
 * arguments. There is no escaping; values that could contain commas or
 * whitespace (file contents) travel base64-encoded.
 *
 * Parsing happens once here. Downstream code only sees the typed results.
 */

/** Verb + positional arguments of a normalized command line. */
export interface ParsedCommand {
  readonly verb: string;
  readonly args: readonly string[];
}

const WHITESPACE_RE = /\s+/g;

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Normalizes and tokenizes a command line.
 *
 * @param minTokens - minimum number of tokens (verb included) the caller requires
 * @throws InvalidCommandError when the normalized line is empty or too short
 */
export function parseCommandLine(line: string, minTokens = 1): ParsedCommand {
  const normalized = line.replace(WHITESPACE_RE, '');
  if (normalized.length === 0) {
    throw new InvalidCommandError('invalid command: empty command line');
  }

  const [verb = '', ...args] = normalized.split(',');
  if (args.length + 1 < minTokens) {
    throw new InvalidCommandError(
      `invalid command: ${verb} expects at least ${minTokens - 1} argument(s)`,
    );
  }

  return { verb, args };
}

// ── exec ─────────────────────────────────────────────────

export interface ExecCommand {
  readonly program: string;
  readonly args: readonly string[];
}

export function parseExecCommand(line: string): ExecCommand {
  const { verb, args } = parseCommandLine(line);
  return { program: verb, args };
}

// ── control ──────────────────────────────────────────────

export const CONTROL_VERBS = [
  'edgex-operation',
  'edgex-config',
  'edgex-metrics',
  'edgex-ping',
] as const;

export type ControlVerb = (typeof CONTROL_VERBS)[number];

export type ControlCommand =
  | { readonly kind: 'edgex-operation'; readonly args: readonly string[] }
  | { readonly kind: 'edgex-config'; readonly args: readonly string[] }
  | { readonly kind: 'edgex-metrics'; readonly args: readonly string[] }
  | { readonly kind: 'edgex-ping' }
  | { readonly kind: 'unknown'; readonly verb: string };

/**
 * Parses a device-control command.
 *
 * Every verb takes at least one argument, except `edgex-ping` which
 * ignores whatever follows it.
 */
export function parseControlCommand(line: string): ControlCommand {
  const { verb, args } = parseCommandLine(line);
  if (verb === 'edgex-ping') {
    return { kind: 'edgex-ping' };
  }
  if (args.length < 1) {
    throw new InvalidCommandError(`invalid command: ${verb} expects at least 1 argument(s)`);
  }

  switch (verb) {
    case 'edgex-operation':
      return { kind: 'edgex-operation', args };
    case 'edgex-config':
      return { kind: 'edgex-config', args };
    case 'edgex-metrics':
      return { kind: 'edgex-metrics', args };
    default:
      return { kind: 'unknown', verb };
  }
}

// ── service config ───────────────────────────────────────

export type ServiceConfigCommand =
  | { readonly kind: 'view' }
  | {
      readonly kind: 'save';
      readonly service: string;
      readonly fileName: string;
      readonly content: string;
    }
  | { readonly kind: 'unknown'; readonly verb: string };

/**
 * Parses a service-configuration command.
 *
 * `save,<service>,<file>,<base64>`: extra trailing tokens are ignored.
 */
export function parseServiceConfigCommand(line: string): ServiceConfigCommand {
  const { verb, args } = parseCommandLine(line);

  switch (verb) {
    case 'view':
      return { kind: 'view' };
    case 'save': {
      const [service, fileName, content] = args;
      if (service === undefined || fileName === undefined || content === undefined) {
        throw new InvalidCommandError('invalid command: save expects service, file name and content');
      }
      return { kind: 'save', service, fileName, content };
    }
    default:
      return { kind: 'unknown', verb };
  }
}

/**
 * Decodes standard, padded base64.
 *
 * Node's decoder silently skips characters outside the alphabet, so the
 * input is checked against the alphabet first.
 */
export function decodeBase64(content: string): Uint8Array {
  if (!BASE64_RE.test(content)) {
    throw new DecodingError('file content is not valid base64');
  }
  return Buffer.from(content, 'base64');
}
