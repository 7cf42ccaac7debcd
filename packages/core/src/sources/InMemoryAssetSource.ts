/**
 * InMemoryAssetSource - AssetSource over programs held in memory
 *
 * Folder filters are path prefixes ("/Game/UI" lists "/Game/UI/..." but
 * not "/Game/UIKit/..."). An empty filter list lists everything.
 */

import type { AssetSource, Program, ProgramDescriptor, ProgramId } from '@graphlint/types';

export class InMemoryAssetSource implements AssetSource {
  private readonly programs = new Map<ProgramId, Program>();
  private loads = 0;

  constructor(programs: Iterable<Program> = []) {
    for (const program of programs) {
      this.add(program);
    }
  }

  add(program: Program): void {
    this.programs.set(program.path, program);
  }

  /** Number of loadProgram calls so far */
  get loadCount(): number {
    return this.loads;
  }

  listCandidatePrograms(pathFilters: readonly string[]): ProgramDescriptor[] {
    const result: ProgramDescriptor[] = [];
    for (const program of this.programs.values()) {
      if (pathFilters.length > 0 && !pathFilters.some(filter => isUnderFolder(program.path, filter))) {
        continue;
      }
      result.push({ id: program.path, name: program.name, parent: program.parent });
    }
    return result;
  }

  loadProgram(id: ProgramId): Program | null {
    this.loads++;
    return this.programs.get(id) ?? null;
  }
}

function isUnderFolder(path: string, folder: string): boolean {
  const prefix = folder.endsWith('/') ? folder : `${folder}/`;
  return path.startsWith(prefix);
}
