import { statSync } from "node:fs";
import { resolve } from "node:path";

/**
 * Storage view used for staleness checks: a target's nominal artifact is
 * the file named like the target, relative to the invocation root.
 */
export interface ArtifactStore {
  exists(name: string): boolean;
  modifiedTime(name: string): number | undefined;
}

export class FileArtifactStore implements ArtifactStore {
  constructor(private readonly root: string) {}

  exists(name: string): boolean {
    return this.modifiedTime(name) !== undefined;
  }

  modifiedTime(name: string): number | undefined {
    const stats = statSync(resolve(this.root, name), { throwIfNoEntry: false });
    return stats?.mtimeMs;
  }
}
