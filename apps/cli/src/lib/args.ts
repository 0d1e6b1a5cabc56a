import { CliError } from './errors.js';
import type { ParsedArgs } from './types.js';

const VALUE_FLAGS = new Set(['--policy', '--out']);

function readFlagValue(flag: string, inline: string | undefined, tokens: string[], index: number): [string, number] {
  if (inline !== undefined) {
    if (inline.length === 0) throw new CliError('MISSING_REQUIRED', `${flag} requires a value.`);
    return [inline, index];
  }

  const next = tokens[index + 1];
  if (next === undefined || next.startsWith('-')) {
    throw new CliError('MISSING_REQUIRED', `${flag} requires a value.`);
  }
  return [next, index + 1];
}

/**
 * Splits argv into the command, its positionals and flags.
 *
 * Value flags take `--flag value` or `--flag=value`. Everything after `--` is
 * positional.
 */
export function parseArgs(tokens: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    positionals: [],
    global: { output: 'pretty', verbose: false, help: false },
    apply: { ignoreCase: false, rejectAmbiguous: false, tidy: false, dryRun: false },
  };

  let onlyPositionals = false;
  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];

    if (onlyPositionals || !token.startsWith('-') || token === '-') {
      if (parsed.command === undefined) parsed.command = token;
      else parsed.positionals.push(token);
      continue;
    }

    if (token === '--') {
      onlyPositionals = true;
      continue;
    }

    const eq = token.indexOf('=');
    const flag = eq === -1 ? token : token.slice(0, eq);
    const inline = eq === -1 ? undefined : token.slice(eq + 1);

    if (inline !== undefined && !VALUE_FLAGS.has(flag)) {
      throw new CliError('INVALID_ARGUMENT', `${flag} does not take a value.`);
    }

    switch (flag) {
      case '--json':
        parsed.global.output = 'json';
        break;
      case '--verbose':
      case '-v':
        parsed.global.verbose = true;
        break;
      case '--help':
      case '-h':
        parsed.global.help = true;
        break;
      case '--ignore-case':
        parsed.apply.ignoreCase = true;
        break;
      case '--reject-ambiguous':
        parsed.apply.rejectAmbiguous = true;
        break;
      case '--tidy':
        parsed.apply.tidy = true;
        break;
      case '--dry-run':
        parsed.apply.dryRun = true;
        break;
      case '--policy': {
        const [value, next] = readFlagValue(flag, inline, tokens, index);
        parsed.apply.policy = value;
        index = next;
        break;
      }
      case '--out':
      case '-o': {
        const [value, next] = readFlagValue('--out', inline, tokens, index);
        parsed.apply.out = value;
        index = next;
        break;
      }
      default:
        throw new CliError('INVALID_ARGUMENT', `Unknown option: ${flag}`);
    }
  }

  return parsed;
}
