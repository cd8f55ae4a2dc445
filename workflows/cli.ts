// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { checkCommand, renderCommand } from "./cmd/render.ts";
import { planCommand } from "./cmd/plan.ts";
import { runCommand } from "./cmd/run.ts";
import { errorMessage } from "./lib/errors.ts";

export async function cli(args: string[]): Promise<void> {
  await yargs(args)
    .scriptName("docs-pipeline")
    .usage("$0 <command> [options]")
    .command(renderCommand)
    .command(checkCommand)
    .command(planCommand)
    .command(runCommand)
    .demandCommand(1, "You need to specify a command")
    .strict()
    .help()
    .parseAsync();
}

cli(hideBin(process.argv)).catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
