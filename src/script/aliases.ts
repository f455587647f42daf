/**
 * Alias extraction from the expanded top-level stream
 */

import { syntaxError } from './errors.js';
import { resolveBody } from './labels.js';
import { parseAliasName } from './lexer.js';
import type { AliasDefinition, Statement } from './types.js';

export const MAIN_BODY_NAME = '<main>';

export interface ExtractedAliases {
  /** Top-level statements with alias blocks removed */
  main: Statement[];
  aliases: Map<string, AliasDefinition>;
}

/**
 * Pull every `alias <name>; ... endalias;` block out of the stream
 * and register it with its own label table
 */
export function extractAliases(statements: Statement[]): ExtractedAliases {
  const main: Statement[] = [];
  const aliases = new Map<string, AliasDefinition>();
  let open: { name: string; opener: Statement; body: Statement[] } | null =
    null;

  for (const statement of statements) {
    if (statement.kind === 'alias') {
      if (open) {
        throw syntaxError(
          `alias ${parseAliasName(statement.args)} cannot be defined inside alias ${open.name}`,
          statement.position
        );
      }
      open = { name: parseAliasName(statement.args), opener: statement, body: [] };
      continue;
    }

    if (statement.kind === 'endalias') {
      if (!open) {
        throw syntaxError('endalias without a matching alias', statement.position);
      }
      if (aliases.has(open.name)) {
        throw syntaxError(`alias ${open.name} is already defined`, open.opener.position);
      }
      aliases.set(open.name, {
        ...resolveBody(open.name, open.body),
        position: open.opener.position,
      });
      open = null;
      continue;
    }

    if (open) {
      open.body.push(statement);
    } else {
      main.push(statement);
    }
  }

  if (open) {
    throw syntaxError(`alias ${open.name} is missing endalias`, open.opener.position);
  }

  return { main, aliases };
}
