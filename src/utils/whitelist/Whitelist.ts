import * as fs from 'fs';
import * as path from 'path';

import { WhitelistError, errorMessage } from '../../core/errors';
import { WhitelistSet } from '../../types/config';
import { Logger } from '../logger/Logger';
import { isPlainObject } from '../validators/config-validator';

/**
 * Build an immutable whitelist from raw JSON content.
 * Blank and non-string patterns are skipped with a warning.
 */
export function parseWhitelist(raw: unknown, source?: string, logger?: Logger): WhitelistSet {
  if (!isPlainObject(raw)) {
    throw new WhitelistError(`Whitelist must be a JSON object${source ? ` (${source})` : ''}`);
  }

  const rawPatterns = raw.patterns ?? [];
  if (!Array.isArray(rawPatterns)) {
    throw new WhitelistError(`'patterns' must be an array${source ? ` (${source})` : ''}`);
  }

  const patterns: string[] = [];
  rawPatterns.forEach((pattern: unknown, index: number) => {
    if (typeof pattern === 'string' && pattern.trim()) {
      patterns.push(pattern.trim());
    } else {
      logger?.warn(`Whitelist: skipped invalid pattern at index ${index}: ${JSON.stringify(pattern)}`);
    }
  });

  const description = typeof raw.description === 'string' ? raw.description : '';

  return Object.freeze({
    description,
    patterns: Object.freeze(patterns),
    source,
  });
}

/**
 * Load a whitelist file: `{ "description": "...", "patterns": ["*AppInsights*"] }`
 */
export async function loadWhitelist(filePath: string, logger?: Logger): Promise<WhitelistSet> {
  const resolved = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.promises.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new WhitelistError(`Whitelist could not be read: ${resolved} (${errorMessage(error)})`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new WhitelistError(`Whitelist is not valid JSON: ${resolved} (${errorMessage(error)})`);
  }

  const whitelist = parseWhitelist(data, resolved, logger);
  logger?.info(`Loaded whitelist with ${whitelist.patterns.length} pattern(s) from ${resolved}`);
  return whitelist;
}
