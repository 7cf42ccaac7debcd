/**
 * Corpus files - programs exported from the editor as JSON
 */

import { readFileSync } from 'fs';
import { CorpusFormatError } from '../errors/LintError.js';
import { InMemoryAssetSource } from './InMemoryAssetSource.js';
import { parseCorpus } from './parseCorpus.js';

export function loadCorpusFile(filePath: string): InMemoryAssetSource {
  const content = readFileSync(filePath, 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CorpusFormatError(
      `Invalid corpus: ${filePath} is not valid JSON (${message})`,
      { filePath },
      'Re-export the corpus from the editor'
    );
  }

  return new InMemoryAssetSource(parseCorpus(document));
}
