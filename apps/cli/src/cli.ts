import { runApply } from './commands/apply.js';
import { runRead } from './commands/read.js';
import { parseArgs } from './lib/args.js';
import { CliError, toCliError } from './lib/errors.js';
import type { CliEnv, CliIO, CommandContext, CommandExecution, OutputMode, ParsedArgs } from './lib/types.js';

export const HELP = `
docpatch - apply structured change instructions to DOCX documents

Commands:
  apply <changes.json> <files...>  Apply an instruction file to documents
  read <file>                      Extract plain text

Options:
  --policy <list>       Match strategies to try, in order (default: exact,normalize_whitespace)
  --ignore-case         Compare text case-insensitively unless an instruction says otherwise
  --reject-ambiguous    Fail changes whose target occurs more than once in a paragraph
  --tidy                Remove runs that an edit left empty
  --out, -o <path>      Output file (one document) or directory (several); default is in place
  --dry-run             Apply without saving
  --json                Machine-readable output
  --verbose, -v         Log engine activity to stderr (or set DOCPATCH_VERBOSE=1)
  --help, -h            Show this message

Exit codes:
  0  every change applied
  1  the command failed
  2  the command finished but some changes failed

Examples:
  docpatch apply changes.json ./contracts/*.docx --out ./revised
  docpatch apply changes.json lease.docx --policy exact,trim --reject-ambiguous
  docpatch read ./proposal.docx
`;

function dispatch(args: ParsedArgs, context: CommandContext): Promise<CommandExecution> {
  switch (args.command) {
    case 'apply':
      return runApply(args, context);
    case 'read':
      return runRead(args);
    default:
      throw new CliError('UNKNOWN_COMMAND', `Unknown command: ${args.command}`, { command: args.command });
  }
}

function writeError(io: CliIO, output: OutputMode, error: CliError): void {
  if (output === 'json') {
    const envelope = { ok: false, error: { code: error.code, message: error.message, details: error.details } };
    io.stderr(`${JSON.stringify(envelope, null, 2)}\n`);
    return;
  }

  io.stderr(`Error: ${error.message}\n`);
  if (error.code === 'UNKNOWN_COMMAND') io.stdout(HELP);
}

/**
 * Runs one CLI invocation and resolves with the process exit code.
 */
export async function run(argv: string[], io: CliIO, env: CliEnv = process.env): Promise<number> {
  let output: OutputMode = argv.includes('--json') ? 'json' : 'pretty';

  try {
    const args = parseArgs(argv);
    output = args.global.output;

    if (args.global.help || args.command === undefined) {
      io.stdout(HELP);
      return 0;
    }

    const execution = await dispatch(args, { io, env, global: args.global });

    if (output === 'json') {
      const envelope = { ok: true, command: execution.command, data: execution.data };
      io.stdout(`${JSON.stringify(envelope, null, 2)}\n`);
    } else {
      io.stdout(`${execution.pretty}\n`);
    }
    return execution.exitCode ?? 0;
  } catch (error) {
    const cliError = toCliError(error);
    writeError(io, output, cliError);
    return cliError.exitCode;
  }
}
