import type { Command } from 'commander';

const FLAG = /^--?([^-=][^=]*)(=.*)?$/;

/**
 * Long flags the program knows, mapped to whether they take a value.
 * `--help` is handled by commander outside `program.options`.
 */
export function longFlags(program: Command): Map<string, boolean> {
  const flags = new Map<string, boolean>([['--help', false]]);
  for (const option of program.options) {
    if (option.long !== undefined) {
      flags.set(option.long, option.required || option.optional);
    }
  }
  return flags;
}

/**
 * Accept single-dash long flags (`-mode pub`, `-url=nats://…`)
 * by rewriting them to `--mode pub`. The value after a flag is copied
 * untouched, so `-msg -mode` publishes the text "-mode".
 * Everything after `--` is left alone.
 */
export function normalizeArgv(
  argv: readonly string[],
  flags: ReadonlyMap<string, boolean>,
): string[] {
  const out: string[] = [];
  let i = 0;

  while (i < argv.length) {
    const token = argv[i++] ?? '';
    if (token === '--') {
      out.push(token, ...argv.slice(i));
      break;
    }

    const match = FLAG.exec(token);
    const long = match ? `--${match[1] ?? ''}` : undefined;
    if (long === undefined || !flags.has(long)) {
      out.push(token);
      continue;
    }

    const inline = match?.[2];
    out.push(long + (inline ?? ''));
    if (inline === undefined && flags.get(long) === true && i < argv.length) {
      out.push(argv[i++] ?? '');
    }
  }

  return out;
}
