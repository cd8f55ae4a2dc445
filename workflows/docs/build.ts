// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import { spawn } from "node:child_process";
import { copyFile, mkdir, rm } from "node:fs/promises";
import { join, resolve } from "node:path";

import { ACTIONS, RUNNER } from "../lib/defs.ts";
import { BuildError, errorMessage } from "../lib/errors.ts";
import { render } from "../lib/expr.ts";
import type { WorkflowJob } from "../lib/github.ts";
import { checkoutStep } from "../lib/checkout.ts";
import { logger, type Logger } from "../lib/log.ts";
import { type Command, commandLine, script } from "../lib/script.ts";
import { BUILD_DIR, docRootUrl, type DocsPipelineSpec } from "./spec.ts";
import { tagCondition } from "./trigger.ts";

/**
 * The commands that install the doc generator and render the site, in
 * order.  They run in the docs source directory.
 */
export function buildCommands(spec: DocsPipelineSpec, version: string): Command[] {
  return [
    {
      program: "pip",
      args: ["install", "-r", spec.requirements ?? "requirements.txt"],
    },
    {
      program: "sphinx-build",
      args: ["-b", "html", ".", `${BUILD_DIR}/${version}`],
    },
  ];
}

export function buildDocsJob(spec: DocsPipelineSpec): WorkflowJob {
  const [install, ...render_cmds] = buildCommands(
    spec,
    "${{env.RELEASE_VERSION}}",
  );
  const copies = (spec.static_files ?? []).map((f) =>
    commandLine({ program: "cp", args: [f, `${BUILD_DIR}/`] })
  );

  return {
    name: `Build ${spec.crate} documentation`,
    "runs-on": RUNNER,
    container: spec.image,
    steps: [
      checkoutStep(),
      {
        name: "🏷️ Set release version from tag",
        if: render(tagCondition()),
        // the condition ignores case, so cut the prefix by length
        shell: "bash",
        run: script(
          'echo "RELEASE_VERSION=${GITHUB_REF:${#TAG_REFS_FILTER}}" >> $GITHUB_ENV',
        ),
      },
      {
        name: "📦 Install documentation dependencies",
        "working-directory": "${{env.docs_dir}}",
        run: script(commandLine(install)),
      },
      {
        name: "📚 Build ${{env.crate}} sphinx docs",
        "working-directory": "${{env.docs_dir}}",
        env: {
          DOC_ROOT_URL: "/${{env.url_dest_dir}}",
        },
        run: script(...render_cmds.map(commandLine), ...copies),
      },
      {
        name: "📤 Package documentation site",
        uses: ACTIONS.upload,
        with: {
          name: "docs-${{env.crate}}",
          path: `\${{env.docs_dir}}/${BUILD_DIR}/`,
        },
      },
    ],
  };
}

export interface RunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export interface CommandRunner {
  run(cmd: Command, options: RunOptions): Promise<void>;
}

/**
 * Runs commands as child processes, passing their output through.
 */
export const spawnRunner: CommandRunner = {
  run(cmd, options) {
    return new Promise((resolve, reject) => {
      const child = spawn(cmd.program, cmd.args, {
        cwd: options.cwd,
        env: options.env,
        signal: options.signal,
        stdio: "inherit",
      });
      child.on("error", (err) => {
        reject(
          new BuildError(`${cmd.program}: ${err.message}`, null, { cause: err }),
        );
      });
      child.on("close", (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(
            new BuildError(`${commandLine(cmd)} exited with status ${code}`, code),
          );
        }
      });
    });
  },
};

export interface BuildOptions {
  /** Repository checkout the docs directory is relative to. */
  root: string;
  runner?: CommandRunner;
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * Build the documentation site for a release version.
 * @returns The output directory, holding the versioned site and the
 * static files.
 */
export async function buildDocs(
  spec: DocsPipelineSpec,
  version: string,
  options: BuildOptions,
): Promise<string> {
  const runner = options.runner ?? spawnRunner;
  const log = options.log ?? logger.child({ stage: "build" });
  const cwd = resolve(options.root, spec.docs_dir);
  const out = join(cwd, BUILD_DIR);
  const env = { ...process.env, DOC_ROOT_URL: docRootUrl(spec) };

  await rm(out, { recursive: true, force: true });

  for (const cmd of buildCommands(spec, version)) {
    options.signal?.throwIfAborted();
    log.info("running build command", { command: commandLine(cmd), cwd });
    await runner.run(cmd, { cwd, env, signal: options.signal });
  }

  await mkdir(out, { recursive: true });
  for (const file of spec.static_files ?? []) {
    try {
      await copyFile(join(cwd, file), join(out, file));
    } catch (err) {
      throw new BuildError(`cannot copy ${file}: ${errorMessage(err)}`, null, {
        cause: err,
      });
    }
  }

  log.info("documentation built", { version, output: out });
  return out;
}
