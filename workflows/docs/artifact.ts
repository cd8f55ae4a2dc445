// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * A local stand-in for CI build artifacts: named directory trees handed
 * from the build stage to the publish stage.
 * @module
 */

import { cp, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import fg from "fast-glob";

import { PublishError } from "../lib/errors.ts";

/** List the files under a directory as sorted, `/`-separated relative paths. */
export async function listFiles(dir: string): Promise<string[]> {
  const files = await fg("**/*", { cwd: dir, dot: true, onlyFiles: true });
  return files.sort();
}

export class ArtifactStore {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  /**
   * A store for a single run's artifacts, below this one.  Runs with
   * different ids never see each other's artifacts.
   */
  scope(run: string): ArtifactStore {
    return new ArtifactStore(join(this.root, run));
  }

  path(name: string): string {
    return join(this.root, name);
  }

  /**
   * Package a directory tree as an artifact, replacing any artifact of the
   * same name.  The tree is copied as-is.
   * @returns The packaged files.
   */
  async upload(name: string, source: string): Promise<string[]> {
    const dest = this.path(name);
    await rm(dest, { recursive: true, force: true });
    await cp(source, dest, { recursive: true });
    return await listFiles(dest);
  }

  /**
   * Locate an artifact for download.
   * @returns The artifact's directory.
   */
  async download(name: string): Promise<string> {
    const dir = this.path(name);
    const info = await stat(dir).catch(() => null);
    if (!info?.isDirectory()) {
      throw new PublishError(`artifact ${name} not found in ${this.root}`);
    }
    return dir;
  }

  /** Remove every artifact in the store. */
  async clear(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
  }
}
