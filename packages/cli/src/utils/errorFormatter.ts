/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

/**
 * Print a standardized error message and exit with code 1.
 *
 * @example
 * exitWithError('Corpus file not found: game.json', [
 *   'Export the project corpus first'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}
