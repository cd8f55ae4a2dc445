// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * In-process stand-ins for the object store, the CDN, and the doc
 * generator, for tests.
 * @module
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { Command } from "../lib/script.ts";
import type { CommandRunner, RunOptions } from "./build.ts";
import type { CdnInvalidator } from "./invalidate.ts";
import type { ObjectStore, PutRequest } from "./publish.ts";

export class MemoryStore implements ObjectStore {
  readonly objects = new Map<string, PutRequest>();
  failOn?: string;

  async put(request: PutRequest): Promise<void> {
    if (request.key == this.failOn) {
      throw new Error("connection reset");
    }
    this.objects.set(request.key, request);
  }

  keys(): string[] {
    return [...this.objects.keys()];
  }
}

export class FakeCdn implements CdnInvalidator {
  readonly requests: string[][] = [];
  fail = false;

  async invalidate(paths: string[]): Promise<string> {
    if (this.fail) {
      throw new Error("throttled");
    }
    this.requests.push(paths);
    return `INV${this.requests.length}`;
  }
}

/**
 * Pretends to be pip and sphinx-build: records each command, and writes a
 * one-page site for `sphinx-build`.
 */
export class FakeSphinx implements CommandRunner {
  readonly calls: { cmd: Command; options: RunOptions }[] = [];
  failWith?: Error;

  async run(cmd: Command, options: RunOptions): Promise<void> {
    this.calls.push({ cmd, options });
    if (this.failWith) {
      throw this.failWith;
    }
    if (cmd.program == "sphinx-build") {
      const out = join(options.cwd, cmd.args[cmd.args.length - 1]);
      await mkdir(out, { recursive: true });
      await writeFile(join(out, "index.html"), "<h1>docs</h1>");
    }
  }
}

/** Lay out a docs source directory with its static files. */
export async function writeDocsSources(root: string, docsDir: string): Promise<void> {
  const dir = join(root, docsDir);
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, "conf.py"), "project = 'docs'\n");
  await writeFile(join(dir, "versions.json"), '["main"]\n');
  await writeFile(join(dir, "index.html"), "<meta http-equiv=\"refresh\">\n");
}
