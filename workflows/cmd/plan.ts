// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import type { CommandModule } from "yargs";

import { planPipeline } from "../docs/pipeline.ts";
import { eventBuilder, type EventOptions, readEvent, selectPipeline } from "./event.ts";

export const planCommand: CommandModule<object, EventOptions> = {
  command: "plan",
  describe: "Show what a trigger event would build and publish",
  builder: eventBuilder,
  handler: async (argv) => {
    const spec = selectPipeline(argv.pipeline);
    const event = await readEvent(argv);
    console.log(JSON.stringify(planPipeline(spec, event), null, 2));
  },
};
