export const COMMANDS = [
  'audit-enforce',
  'namespace-apply',
  'controller-logs',
  'operator-search',
  'scc-templates'
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface CliArgs {
  command: CommandName;
  kubeconfig?: string | undefined;
  context?: string | undefined;
  showWarnings: boolean;
  fieldManager?: string | undefined;
  pattern?: string | undefined;
  create: boolean;
  logs: boolean;
  debug: boolean;
  out?: string | undefined;
  searchTerm?: string | undefined;
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.some(c => c === value);
}

// Flags that take a value, with their short aliases
const VALUE_FLAGS: Record<string, 'kubeconfig' | 'context' | 'fieldManager' | 'pattern' | 'out'> = {
  '--kubeconfig': 'kubeconfig',
  '-k': 'kubeconfig',
  '--context': 'context',
  '-c': 'context',
  '--field-manager': 'fieldManager',
  '--pattern': 'pattern',
  '-p': 'pattern',
  '--out': 'out',
  '-o': 'out'
};

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: 'audit-enforce',
    kubeconfig: undefined,
    context: undefined,
    showWarnings: false,
    fieldManager: undefined,
    pattern: undefined,
    create: false,
    logs: true,
    debug: false,
    out: undefined,
    searchTerm: undefined
  };

  const positionalArgs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];
    if (arg === undefined) break;

    // Handle --flag value and -f value
    const valueFlag = VALUE_FLAGS[arg];
    if (valueFlag) {
      result[valueFlag] = args[i + 1];
      i += 2;
      continue;
    }

    // Handle --flag=value
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq !== -1) {
      const flag = VALUE_FLAGS[arg.slice(0, eq)];
      if (flag) {
        result[flag] = arg.slice(eq + 1);
        i++;
        continue;
      }
    }

    switch (arg) {
      case '--show-warnings':
        result.showWarnings = true;
        break;
      case '--create':
        result.create = true;
        break;
      case '--logs':
        result.logs = true;
        break;
      case '--no-logs':
        result.logs = false;
        break;
      case '--debug':
        result.debug = true;
        break;
      default:
        // Collect positional arguments
        if (!arg.startsWith('-')) {
          positionalArgs.push(arg);
        }
    }

    i++;
  }

  // First positional argument is the command, the second the search term
  const [command, searchTerm] = positionalArgs;
  if (command !== undefined) {
    if (!isCommand(command)) {
      throw new Error(`Unknown command "${command}". Available commands: ${COMMANDS.join(', ')}`);
    }
    result.command = command;
  }
  result.searchTerm = searchTerm;

  return result;
}
