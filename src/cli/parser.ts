import { parsePositiveInt } from '../config/config';

export interface CliArgs {
  node?: string | undefined;
  allNodes: boolean;
  action?: string | undefined;
  catalog?: string | undefined;
  inventory?: string | undefined;
  output?: string | undefined;
  context?: string | undefined;
  timeoutMs?: number | undefined;
  dedupeGaps: boolean;
  template: boolean;
}

// Value of "--flag value" or "--flag=value"; returns the new index
function readValue(args: string[], i: number, flag: string): [string | undefined, number] {
  const arg = args[i] ?? '';
  if (arg.startsWith(`${flag}=`)) {
    return [arg.slice(flag.length + 1), i + 1];
  }
  return [args[i + 1], i + 2];
}

function matches(arg: string, flag: string, short?: string): boolean {
  return arg === flag || arg === short || arg.startsWith(`${flag}=`);
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    node: undefined,
    allNodes: false,
    action: undefined,
    catalog: undefined,
    inventory: undefined,
    output: undefined,
    context: undefined,
    timeoutMs: undefined,
    dedupeGaps: false,
    template: false,
  };

  let i = 0;

  while (i < args.length) {
    const arg = args[i] ?? '';

    // Handle --node or -n
    if (matches(arg, '--node', '-n')) {
      [result.node, i] = readValue(args, i, '--node');
      continue;
    }

    // Handle --all or -a
    if (arg === '--all' || arg === '-a') {
      result.allNodes = true;
      i++;
      continue;
    }

    if (matches(arg, '--action')) {
      [result.action, i] = readValue(args, i, '--action');
      continue;
    }

    if (matches(arg, '--catalog')) {
      [result.catalog, i] = readValue(args, i, '--catalog');
      continue;
    }

    if (matches(arg, '--inventory')) {
      [result.inventory, i] = readValue(args, i, '--inventory');
      continue;
    }

    // Handle --output or -o
    if (matches(arg, '--output', '-o')) {
      [result.output, i] = readValue(args, i, '--output');
      continue;
    }

    // Handle --context or -c
    if (matches(arg, '--context', '-c')) {
      [result.context, i] = readValue(args, i, '--context');
      continue;
    }

    if (matches(arg, '--timeout')) {
      let raw: string | undefined;
      [raw, i] = readValue(args, i, '--timeout');
      const timeoutMs = parsePositiveInt(raw, 0);
      result.timeoutMs = timeoutMs > 0 ? timeoutMs : undefined;
      continue;
    }

    if (arg === '--dedupe-gaps') {
      result.dedupeGaps = true;
      i++;
      continue;
    }

    if (arg === '--template') {
      result.template = true;
      i++;
      continue;
    }

    i++;
  }

  return result;
}
