// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import { readFile } from "node:fs/promises";
import type { Options } from "yargs";

import { PIPELINES } from "../docs.ts";
import type { DocsPipelineSpec } from "../docs/spec.ts";
import { parsePushEvent, type TriggerEvent } from "../docs/trigger.ts";

export interface EventOptions {
  pipeline: string;
  ref?: string;
  path?: string[];
  "event-path"?: string;
  "event-name": string;
}

export const eventBuilder = {
  pipeline: {
    type: "string",
    describe: "Documentation pipeline to use",
    choices: Object.keys(PIPELINES),
    default: Object.keys(PIPELINES)[0],
  },
  ref: {
    type: "string",
    describe: "Git ref that triggered the run (e.g. refs/heads/main)",
  },
  path: {
    type: "string",
    array: true,
    describe: "Changed path; may be repeated",
  },
  "event-path": {
    type: "string",
    describe: "GitHub event payload to read the ref and changed paths from",
  },
  "event-name": {
    type: "string",
    describe: "Name of the triggering event",
    default: "push",
  },
} satisfies Record<string, Options>;

export function selectPipeline(key: string): DocsPipelineSpec {
  const spec = PIPELINES[key];
  if (!spec) {
    throw new Error(`unknown pipeline ${key}`);
  }
  return spec;
}

/**
 * Assemble the trigger event from the command line: either an event
 * payload file (defaulting to `GITHUB_EVENT_PATH`) or an explicit ref and
 * paths.
 */
export async function readEvent(argv: EventOptions): Promise<TriggerEvent> {
  if (argv.ref) {
    return {
      name: argv["event-name"],
      ref: argv.ref,
      changedPaths: argv.path ?? [],
    };
  }
  const file = argv["event-path"] ?? process.env.GITHUB_EVENT_PATH;
  if (!file) {
    throw new Error("either --ref or --event-path is required");
  }
  const payload: unknown = JSON.parse(await readFile(file, "utf-8"));
  return parsePushEvent(payload, argv["event-name"]);
}
