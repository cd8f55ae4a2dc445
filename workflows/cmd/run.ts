// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import { resolve } from "node:path";
import { CloudFrontClient } from "@aws-sdk/client-cloudfront";
import { S3Client } from "@aws-sdk/client-s3";
import type { CommandModule } from "yargs";

import { ArtifactStore } from "../docs/artifact.ts";
import { loadEnvFile, loadRunConfig, type RunConfig } from "../docs/config.ts";
import { CloudFrontInvalidator } from "../docs/invalidate.ts";
import { type PipelineStages, RefConcurrency, runPipeline } from "../docs/pipeline.ts";
import { S3ObjectStore } from "../docs/publish.ts";
import { logger, setLogLevel } from "../lib/log.ts";
import { eventBuilder, type EventOptions, readEvent, selectPipeline } from "./event.ts";

interface RunOptions extends EventOptions {
  root: string;
  "env-file"?: string;
}

export function awsStages(config: RunConfig, root: string): PipelineStages {
  const client = { region: config.region, credentials: config.credentials };
  return {
    artifacts: new ArtifactStore(resolve(root, config.artifactDir)),
    store: new S3ObjectStore(new S3Client(client), config.bucket),
    cdn: new CloudFrontInvalidator(new CloudFrontClient(client), config.distributionId),
  };
}

export const runCommand: CommandModule<object, RunOptions> = {
  command: "run",
  describe: "Build, publish and invalidate the documentation locally",
  builder: {
    ...eventBuilder,
    root: {
      type: "string",
      describe: "Repository checkout holding the documentation sources",
      default: ".",
    },
    "env-file": {
      type: "string",
      describe: "File of environment settings to load",
    },
  },
  handler: async (argv) => {
    loadEnvFile(argv["env-file"]);
    const config = loadRunConfig();
    setLogLevel(config.logLevel);

    const spec = selectPipeline(argv.pipeline);
    const event = await readEvent(argv);
    const root = resolve(argv.root);
    const stages = awsStages(config, root);

    const report = await new RefConcurrency().run(
      event.ref,
      (signal) => runPipeline(spec, event, stages, { root, signal, log: logger }),
    );
    console.log(JSON.stringify(report, null, 2));
    if (report.conclusion == "failure" || report.conclusion == "cancelled") {
      process.exitCode = 1;
    }
  },
};
