// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import type { CommandModule } from "yargs";

import { checkWorkflows, WORKFLOW_DIR, writeWorkflows } from "../render.ts";

interface RenderOptions {
  dir: string;
}

const dirOption = {
  dir: {
    type: "string" as const,
    describe: "Directory holding the workflow files",
    default: WORKFLOW_DIR,
  },
};

export const renderCommand: CommandModule<object, RenderOptions> = {
  command: "render",
  describe: "Write the workflow files",
  builder: dirOption,
  handler: async (argv) => {
    for (const path of await writeWorkflows(argv.dir)) {
      console.log(`wrote ${path}`);
    }
  },
};

export const checkCommand: CommandModule<object, RenderOptions> = {
  command: "check",
  describe: "Check that the workflow files are up to date",
  builder: dirOption,
  handler: async (argv) => {
    const results = await checkWorkflows(argv.dir);
    for (const { file, status } of results) {
      console.log(`${status.padEnd(8)}${file}`);
    }
    if (results.some((r) => r.status != "ok")) {
      console.error("workflow files are out of date; run `npm run render`");
      process.exitCode = 1;
    }
  },
};
