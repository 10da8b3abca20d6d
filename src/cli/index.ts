#!/usr/bin/env node
/**
 * bookgossip CLI - run a review peer with an interactive shell
 *
 * Usage: bookgossip [--port N] [--web-port N] [--bootstrap ws://host:port[,...]] [--data-dir DIR]
 */

import { createInterface } from 'readline';
import { join } from 'path';
import { loadConfig, type NodeSettings, type SettingsOverrides } from '../config.js';
import { Crypto } from '../crypto.js';
import { ConfigError } from '../errors.js';
import { WebSocketTransport } from '../network/ws-transport.js';
import { ReviewNode } from '../review-node.js';
import { JsonFileReviewPersistence } from '../store/file-store.js';
import { ReviewWebServer } from '../web/server.js';
import { CommandAdapter, renderResult } from './command-adapter.js';
import { parseCommand, USAGE } from './command-parser.js';
import { IdentityManager } from './identity-manager.js';

const VERSION = '0.1.0';

const FLAGS: Record<string, keyof NodeSettings | undefined> = {
  '--port': 'port',
  '--web-port': 'webPort',
  '--bootstrap': 'bootstrap',
  '--data-dir': 'dataDir'
};

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`bookgossip v${VERSION}`);
    return;
  }

  const settings = loadConfig(process.env, parseFlags(args));
  const identity = new IdentityManager(join(settings.dataDir, 'identity.json')).loadOrCreate();

  const node = new ReviewNode({
    identity,
    transport: new WebSocketTransport({
      peerId: Crypto.toHex(identity.publicKey),
      port: settings.port,
      host: settings.host,
      advertisedAddress: settings.advertise,
      bootstrap: settings.bootstrap,
      redialIntervalMs: settings.redialIntervalMs
    }),
    persistence: new JsonFileReviewPersistence(join(settings.dataDir, 'reviews.json')),
    requireSignatures: settings.requireSignatures,
    announceIntervalMs: settings.announceIntervalMs,
    antiEntropyIntervalMs: settings.antiEntropyIntervalMs,
    silenceCheckIntervalMs: settings.silenceCheckIntervalMs,
    silenceTimeoutMs: settings.silenceTimeoutMs,
    persistIntervalMs: settings.persistIntervalMs
  });

  await node.start();
  const adapter = new CommandAdapter(node);

  let web: ReviewWebServer | undefined;
  if (settings.webPort !== undefined) {
    web = new ReviewWebServer({ adapter, port: settings.webPort });
    await web.start();
  }

  console.log(`\n📚 bookgossip peer ${node.peerId}`);
  console.log(`Data directory: ${settings.dataDir}`);
  console.log('Type "help" for commands.\n');

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'bookgossip> ' });

  let stopping: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        rl.close();
        if (web) {
          await web.stop();
        }
        await node.stop();
        console.log('Goodbye.');
        process.exit(0);
      })();
    }
    return stopping;
  };

  // Lines run one at a time so output stays in order
  let pending: Promise<void> = Promise.resolve();
  rl.on('line', line => {
    pending = pending.then(async () => {
      const parsed = parseCommand(line);
      switch (parsed.type) {
        case 'empty':
          break;
        case 'help':
          USAGE.forEach(usage => console.log(usage));
          break;
        case 'quit':
          await shutdown();
          return;
        case 'error':
          console.log(parsed.message);
          break;
        case 'intent':
          renderResult(await adapter.execute(parsed.intent)).forEach(output => console.log(output));
          break;
      }
      if (!stopping) {
        rl.prompt();
      }
    }).catch(error => {
      reportError(error);
      rl.prompt();
    });
  });

  rl.on('close', () => {
    shutdown().catch(reportError);
  });

  process.on('SIGINT', () => {
    shutdown().catch(reportError);
  });

  rl.prompt();
}

function parseFlags(args: string[]): SettingsOverrides {
  const overrides: { [K in keyof NodeSettings]?: unknown } = {};

  for (let i = 0; i < args.length; i++) {
    const key = FLAGS[args[i]];
    if (!key) {
      throw new ConfigError(`Unknown option: ${args[i]}`);
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Option ${args[i]} needs a value`, key);
    }

    if (key === 'bootstrap') {
      const previous = overrides.bootstrap;
      overrides.bootstrap = typeof previous === 'string' ? `${previous},${value}` : value;
    } else {
      overrides[key] = value;
    }
    i++;
  }

  return overrides;
}

function reportError(error: unknown) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
}

function showHelp() {
  console.log(`
bookgossip v${VERSION} - peer-to-peer book reviews

Usage: bookgossip [options]

Options:
  --port <n>          Gossip listen port (default: 7400)
  --web-port <n>      Also serve the HTTP API on this port
  --bootstrap <addr>  Peer address to dial, e.g. ws://192.168.1.20:7400 (repeatable)
  --data-dir <dir>    Data directory (default: ~/.bookgossip)
  -h, --help          Show this help
  -v, --version       Show version

Environment:
  BOOKGOSSIP_DATA_DIR, BOOKGOSSIP_PORT, BOOKGOSSIP_HOST, BOOKGOSSIP_ADVERTISE,
  BOOKGOSSIP_BOOTSTRAP, BOOKGOSSIP_WEB_PORT, BOOKGOSSIP_REQUIRE_SIGNATURES
  DEBUG=1 prints stack traces

${USAGE.join('\n')}
`);
}

main().catch(error => {
  reportError(error);
  process.exit(1);
});
