#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { createInterface } from 'node:readline';
import { ShamirMnemonic } from '../shamir-mnemonic.js';
import { runCreate, runRecover, type PromptIO } from './commands.js';

const USAGE = `Usage: shamir-mnemonic <command> [options]

Commands:
  create <scheme>     Split a master secret into mnemonic shares
  recover             Recover a master secret from mnemonic shares

Schemes:
  single              One 1-of-1 group
  TofN                One T-of-N group, e.g. 2of3
  master              A 1-of-1 group plus a 3-of-5 group; either recovers the secret
  custom              Groups from -g, group threshold from -t

Create options:
  -g, --group TofN          Add a T-of-N group (custom scheme, repeatable)
  -t, --threshold N         Number of groups required for recovery (custom scheme)
  -E, --exponent N          Iteration exponent (default 0)
  -s, --strength BITS       Strength of a random master secret (default 128)
  -S, --master-secret HEX   Use this master secret
  -p, --passphrase TEXT     Encrypt the master secret (requires -S)

Recover options:
  -p, --passphrase-prompt   Ask for a passphrase after the shares`;

function printUsage(): never {
  process.stderr.write(USAGE + '\n');
  process.exit(1);
}

function createTerminalIO(): { io: PromptIO; close: () => void } {
  const rl = createInterface({ input: process.stdin, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  const io: PromptIO = {
    async prompt(question) {
      process.stdout.write(question);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    write(line) {
      console.log(line);
    },
    error(line) {
      process.stderr.write(line + '\n');
    },
  };

  return { io, close: () => rl.close() };
}

async function cmdCreate(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      group: { type: 'string', short: 'g', multiple: true },
      threshold: { type: 'string', short: 't' },
      exponent: { type: 'string', short: 'E' },
      strength: { type: 'string', short: 's' },
      'master-secret': { type: 'string', short: 'S' },
      passphrase: { type: 'string', short: 'p' },
      help: { type: 'boolean' },
    },
  });

  if (values.help) {
    process.stderr.write(USAGE + '\n');
    return 0;
  }

  const [scheme] = positionals;
  if (!scheme || positionals.length > 1) {
    process.stderr.write('Error: create takes exactly one scheme\n');
    return 1;
  }

  const { io, close } = createTerminalIO();
  try {
    return runCreate(
      new ShamirMnemonic(),
      {
        scheme,
        groups: values.group,
        threshold: values.threshold,
        exponent: values.exponent,
        strength: values.strength,
        masterSecret: values['master-secret'],
        passphrase: values.passphrase,
      },
      io
    );
  } finally {
    close();
  }
}

async function cmdRecover(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      'passphrase-prompt': { type: 'boolean', short: 'p' },
      help: { type: 'boolean' },
    },
  });

  if (values.help) {
    process.stderr.write(USAGE + '\n');
    return 0;
  }

  const { io, close } = createTerminalIO();
  try {
    return await runRecover(
      new ShamirMnemonic(),
      { passphrasePrompt: values['passphrase-prompt'] },
      io
    );
  } finally {
    close();
  }
}

const commands: Record<string, (args: string[]) => Promise<number>> = {
  create: cmdCreate,
  recover: cmdRecover,
};

async function main() {
  const [subcommand, ...rest] = process.argv.slice(2);

  if (!subcommand || subcommand === '--help' || subcommand === '-h') {
    printUsage();
  }

  const handler = commands[subcommand];
  if (!handler) {
    process.stderr.write(`Unknown command: ${subcommand}\n\n`);
    printUsage();
  }

  process.exitCode = await handler(rest);
}

main().catch((err: Error) => {
  process.stderr.write(`Error: ${err.message}\n`);
  process.exit(1);
});
