/**
 * ProgramCorpus - every program under the analyzed root, loaded on first use.
 *
 * Cross-program questions ("is this function called from anywhere?")
 * need the whole corpus, not only the programs selected for a scan.
 * A program that fails to load is left out; the rest still answer.
 */

import type { AssetSource, Logger, Program, ProgramId } from '@graphlint/types';

export class ProgramCorpus {
  private readonly source: AssetSource;
  private readonly rootPath: string;
  private readonly logger?: Logger;
  private loaded: Program[] | null = null;

  constructor(source: AssetSource, rootPath: string, logger?: Logger) {
    this.source = source;
    this.rootPath = rootPath;
    this.logger = logger;
  }

  /**
   * Corpus over already loaded programs, mostly for tests
   */
  static of(programs: Program[], rootPath = '/Game'): ProgramCorpus {
    const corpus = new ProgramCorpus({
      listCandidatePrograms: () => [],
      loadProgram: () => null,
    }, rootPath);
    corpus.loaded = [...programs];
    return corpus;
  }

  programs(): readonly Program[] {
    if (this.loaded) {
      return this.loaded;
    }

    const programs: Program[] = [];
    const seen = new Set<ProgramId>();
    for (const descriptor of this.source.listCandidatePrograms([this.rootPath])) {
      if (seen.has(descriptor.id)) continue;
      seen.add(descriptor.id);

      let program: Program | null;
      try {
        program = this.source.loadProgram(descriptor.id);
      } catch (err) {
        this.logger?.warn('Corpus program failed to load, skipping', {
          program: descriptor.id,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }
      if (program) {
        programs.push(program);
      } else {
        this.logger?.debug('Corpus program could not be loaded', { program: descriptor.id });
      }
    }

    this.logger?.debug('Corpus loaded', { root: this.rootPath, programs: programs.length });
    this.loaded = programs;
    return programs;
  }
}
