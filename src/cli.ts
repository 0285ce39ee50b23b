#!/usr/bin/env node

/**
 * Synapse - personal knowledge base with hybrid search
 */

import chalk from 'chalk';
import { parseArgs } from 'node:util';
import { loadConfig } from './config.js';
import {
  InvalidInputError,
  SynapseError,
  createKnowledgeBase,
  formatSearchResults,
  isContentType,
  type CapturedInput,
  type Item,
  type KnowledgeBase,
} from './kb/index.js';

const VERSION = '0.1.0';

const HELP = `Usage: synapse <command> [options]

Personal knowledge base with hybrid (semantic + text) search.

Commands:
  add [content]       Capture content (reads stdin when no content is given)
      -t, --title     Title
      -u, --url       Source URL
          --type      Content type (url, video, amazon, blog, book, recipe, image, note)
      -m, --meta k=v  Capture metadata, repeatable (e.g. image=https://...)
  search <query>      Search, e.g. "pasta recipe tag:dinner last 30 days"
      -n, --limit     Max results
  list                List recent items
      -n, --limit     Max items (default 20)
          --offset    Skip items
  show <id>           Show one item
  delete <id>         Delete an item
  reindex [id]        Re-embed one item, or every item without a vector
  stats               Item and vector counts

Options:
  -v, --version  Show version
  -h, --help     Show this help`;

function parseCli(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: {
      title: { type: 'string', short: 't' },
      url: { type: 'string', short: 'u' },
      type: { type: 'string' },
      meta: { type: 'string', short: 'm', multiple: true },
      limit: { type: 'string', short: 'n' },
      offset: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });
}

type CliValues = ReturnType<typeof parseCli>['values'];

async function main(): Promise<void> {
  const { values, positionals } = parseCli(process.argv.slice(2));
  if (values.version) {
    console.log(`synapse ${VERSION}`);
    return;
  }

  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.log(HELP);
    return;
  }

  const kb = createKnowledgeBase(loadConfig());
  try {
    await run(kb, command, rest, values);
  } finally {
    kb.close();
  }
}

async function run(kb: KnowledgeBase, command: string, args: string[], values: CliValues): Promise<void> {
  switch (command) {
    case 'add': {
      const item = await kb.capture(await captureInput(args, values));
      console.log(chalk.green('Captured'), chalk.dim(item.id));
      printItem(item);
      return;
    }

    case 'search': {
      const query = args.join(' ');
      if (!query.trim()) throw new InvalidInputError('search needs a query');
      const results = await kb.search(query, { limit: parseCount(values.limit, 'limit') });
      console.log(formatSearchResults(results));
      return;
    }

    case 'list': {
      const items = await kb.listItems(parseCount(values.limit, 'limit') ?? 20, parseCount(values.offset, 'offset') ?? 0);
      if (items.length === 0) {
        console.log(chalk.dim('No items yet.'));
        return;
      }
      for (const item of items) {
        console.log(`${chalk.dim(item.id)}  ${chalk.cyan(`[${item.type}]`)} ${item.title || chalk.dim('(untitled)')}`);
      }
      return;
    }

    case 'show': {
      printItem(await kb.getItem(requireId(args)));
      return;
    }

    case 'delete': {
      const id = requireId(args);
      await kb.deleteItem(id);
      console.log(chalk.green('Deleted'), chalk.dim(id));
      return;
    }

    case 'reindex': {
      const { reindexed, failed } = await kb.reindex(args[0]);
      const summary = `Re-indexed ${reindexed} item${reindexed === 1 ? '' : 's'}`;
      console.log(failed ? chalk.yellow(`${summary}, ${failed} failed`) : chalk.green(summary));
      return;
    }

    case 'stats': {
      const { items, vectors } = await kb.stats();
      console.log(`Items:   ${items}`);
      console.log(`Vectors: ${vectors}`);
      return;
    }

    default:
      throw new InvalidInputError(`Unknown command: ${command} (see --help)`);
  }
}

async function captureInput(args: string[], values: CliValues): Promise<CapturedInput> {
  let content = args.join(' ');
  if (!content && !process.stdin.isTTY) {
    content = await readStdin();
  }

  const type = values.type;
  if (type !== undefined && !isContentType(type)) {
    throw new InvalidInputError(`Unknown type: ${type}`);
  }

  return {
    title: values.title ?? '',
    content,
    sourceUrl: values.url,
    type,
    metadata: parseMeta(values.meta ?? []),
  };
}

function parseMeta(pairs: string[]): Record<string, string> | undefined {
  if (pairs.length === 0) return undefined;

  const metadata: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) throw new InvalidInputError(`Expected key=value, got: ${pair}`);
    metadata[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return metadata;
}

function parseCount(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidInputError(`--${name} must be a non-negative integer`);
  }
  return value;
}

function requireId(args: string[]): string {
  const [id] = args;
  if (!id) throw new InvalidInputError('an item id is required');
  return id;
}

async function readStdin(): Promise<string> {
  process.stdin.setEncoding('utf8');
  let text = '';
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text.trim();
}

function printItem(item: Item): void {
  console.log(chalk.bold(item.title || '(untitled)'));
  console.log(`${chalk.cyan(`[${item.type}]`)} ${item.category}  ${chalk.dim(item.createdAt.toISOString())}`);
  if (item.sourceUrl) console.log(chalk.underline(item.sourceUrl));
  if (item.tags.length) console.log(chalk.magenta(item.tags.map((t) => `#${t}`).join(' ')));
  if (item.imageUrl) console.log(chalk.dim(`image: ${item.imageUrl}`));
  console.log();
  console.log(item.summary);
}

main().catch((err: unknown) => {
  if (err instanceof SynapseError) {
    console.error(chalk.red(`${err.code}: ${err.message}`));
  } else {
    console.error(chalk.red('Error:'), err);
  }
  process.exit(1);
});
