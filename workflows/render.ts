// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * Write workflow definitions out as GitHub Actions YAML.
 * @module
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { stringify } from "yaml";

import type { Workflow } from "./lib/github.ts";
import { docsWorkflow, PIPELINES } from "./docs.ts";

export const WORKFLOW_DIR = ".github/workflows";

const HEADER = "# Generated from workflows/docs.ts by `npm run render`.\n";

export function renderWorkflow(workflow: Workflow): string {
  return HEADER + stringify(workflow, { lineWidth: 0 });
}

export interface RenderedWorkflow {
  file: string;
  content: string;
}

export function renderAll(
  workflows: Record<string, Workflow> = allWorkflows(),
): RenderedWorkflow[] {
  return Object.entries(workflows).map(([key, wf]) => ({
    file: `${key}.yml`,
    content: renderWorkflow(wf),
  }));
}

export function allWorkflows(): Record<string, Workflow> {
  const workflows: Record<string, Workflow> = {};
  for (const [key, spec] of Object.entries(PIPELINES)) {
    workflows[key] = docsWorkflow(spec);
  }
  return workflows;
}

export async function writeWorkflows(
  dir: string,
  workflows?: Record<string, Workflow>,
): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const { file, content } of renderAll(workflows)) {
    const path = join(dir, file);
    await writeFile(path, content, "utf-8");
    written.push(path);
  }
  return written;
}

export type FileStatus = "ok" | "missing" | "stale";

export interface CheckResult {
  file: string;
  status: FileStatus;
}

/** Compare the rendered workflows with the files in a directory. */
export async function checkWorkflows(
  dir: string,
  workflows?: Record<string, Workflow>,
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  for (const { file, content } of renderAll(workflows)) {
    let current: string;
    try {
      current = await readFile(join(dir, file), "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code == "ENOENT") {
        results.push({ file, status: "missing" });
        continue;
      }
      throw err;
    }
    results.push({ file, status: current == content ? "ok" : "stale" });
  }
  return results;
}
