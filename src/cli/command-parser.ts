/**
 * Line grammar for the interactive shell
 *
 *   create review <title>|<genre>|<author>|<rating>|<body>
 *   publish review <id>
 *   delete review <id>
 *   show review <id>
 *   list peers
 *   list reviews [peerId]
 *   status | help | quit
 *
 * Keywords are case-insensitive. The body is everything after the fourth
 * `|`, so it may itself contain `|`.
 */

import type { Intent } from './command-adapter.js';

export type ParsedLine =
  | { readonly type: 'intent'; readonly intent: Intent }
  | { readonly type: 'help' }
  | { readonly type: 'quit' }
  | { readonly type: 'empty' }
  | { readonly type: 'error'; readonly message: string };

export const USAGE = [
  'Commands:',
  '  create review <title>|<genre>|<author>|<rating>|<body>',
  '  publish review <id>',
  '  delete review <id>',
  '  show review <id>',
  '  list peers',
  '  list reviews [peerId]',
  '  status',
  '  help',
  '  quit'
] as const;

const CREATE_USAGE = 'Usage: create review <title>|<genre>|<author>|<rating>|<body>';

export function parseCommand(line: string): ParsedLine {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { type: 'empty' };
  }

  const words = trimmed.split(/\s+/);
  const verb = words[0].toLowerCase();
  const noun = words.length > 1 ? words[1].toLowerCase() : undefined;
  const args = words.slice(2);

  switch (verb) {
    case 'help':
      return words.length === 1 ? { type: 'help' } : usageError('help');

    case 'quit':
    case 'exit':
      return words.length === 1 ? { type: 'quit' } : usageError(verb);

    case 'status':
      return words.length === 1 ? intent({ kind: 'status' }) : usageError('status');

    case 'create':
      if (noun !== 'review') {
        return { type: 'error', message: CREATE_USAGE };
      }
      return parseCreate(trimmed);

    case 'publish':
    case 'delete':
    case 'show': {
      if (noun !== 'review' || args.length !== 1) {
        return { type: 'error', message: `Usage: ${verb} review <id>` };
      }
      const id = args[0];
      if (verb === 'publish') return intent({ kind: 'publish-review', id });
      if (verb === 'delete') return intent({ kind: 'delete-review', id });
      return intent({ kind: 'show-review', id });
    }

    case 'list':
      if (noun === 'peers' && args.length === 0) {
        return intent({ kind: 'list-peers' });
      }
      if (noun === 'reviews' && args.length === 0) {
        return intent({ kind: 'list-reviews' });
      }
      if (noun === 'reviews' && args.length === 1) {
        return intent({ kind: 'list-reviews-by-peer', peerId: args[0] });
      }
      return { type: 'error', message: 'Usage: list peers | list reviews [peerId]' };

    default:
      return { type: 'error', message: `Unknown command: ${words[0]} (type "help" for a list)` };
  }
}

function parseCreate(trimmed: string): ParsedLine {
  // Strip the two keywords, keeping the payload's own spacing
  const payload = trimmed.replace(/^\S+\s+\S+/, '').trim();
  const parts = payload.split('|');

  if (parts.length < 5) {
    return { type: 'error', message: CREATE_USAGE };
  }

  const [title, genre, authorName, rating] = parts;
  const body = parts.slice(4).join('|');

  return intent({
    kind: 'create-review',
    fields: { title, genre, authorName, rating, body }
  });
}

function intent(value: Intent): ParsedLine {
  return { type: 'intent', intent: value };
}

function usageError(command: string): ParsedLine {
  return { type: 'error', message: `Usage: ${command}` };
}
