// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * Runs the documentation pipeline in-process, with the same gating as the
 * generated workflow: build, then publish, then invalidate, each only
 * after the previous one succeeded.
 * @module
 */

import { randomUUID } from "node:crypto";

import { errorMessage, ReleaseVersionError } from "../lib/errors.ts";
import { type EvalContext, shouldRun } from "../lib/expr.ts";
import { logger, type Logger } from "../lib/log.ts";
import type { ArtifactStore } from "./artifact.ts";
import { buildDocs, type CommandRunner } from "./build.ts";
import { type CdnInvalidator, invalidateCondition } from "./invalidate.ts";
import { type ObjectStore, syncDirectory, uploadCondition } from "./publish.ts";
import { artifactName, type DocsPipelineSpec, invalidationPath } from "./spec.ts";
import {
  releaseVersion,
  shouldBuild,
  shouldPublish,
  type TriggerEvent,
} from "./trigger.ts";

export type Outcome = "success" | "failure" | "skipped" | "cancelled";

export interface StageReport {
  outcome: Outcome;
  error?: string;
}

export interface PipelinePlan {
  ref: string;
  build: boolean;
  publish: boolean;
  /** `null` when the ref yields no usable version. */
  releaseVersion: string | null;
  artifact: string;
  /** Key prefix of the versioned site in the bucket. */
  destination: string | null;
  invalidation: string;
}

export interface PipelineReport {
  plan: PipelinePlan;
  stages: {
    build: StageReport;
    publish: StageReport;
    invalidate: StageReport;
  };
  published: string[];
  invalidationId?: string;
  conclusion: Outcome;
}

export interface PipelineStages {
  runner?: CommandRunner;
  artifacts: ArtifactStore;
  store: ObjectStore;
  cdn: CdnInvalidator;
}

export interface PipelineOptions {
  /** Repository checkout holding the docs sources. */
  root: string;
  /** Names this run's artifact scope; a fresh id by default. */
  runId?: string;
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * Work out what a trigger event would do, without doing it.
 */
export function planPipeline(
  spec: DocsPipelineSpec,
  event: TriggerEvent,
): PipelinePlan {
  let version: string | null = null;
  try {
    version = releaseVersion(spec, event.ref);
  } catch (err) {
    if (!(err instanceof ReleaseVersionError)) throw err;
  }
  return {
    ref: event.ref,
    build: shouldBuild(spec, event),
    publish: shouldPublish(spec, event),
    releaseVersion: version,
    artifact: artifactName(spec),
    destination: version === null ? null : `${spec.url_dest_dir}${version}/`,
    invalidation: invalidationPath(spec),
  };
}

const skipped = (): StageReport => ({ outcome: "skipped" });

function stepContext(
  steps: Record<string, Outcome>,
  signal?: AbortSignal,
): EvalContext {
  const contexts: Record<string, Record<string, { outcome: Outcome }>> = {
    steps: {},
  };
  for (const [id, outcome] of Object.entries(steps)) {
    contexts.steps[id] = { outcome };
  }
  return {
    contexts,
    status: {
      failed: Object.values(steps).includes("failure"),
      cancelled: signal?.aborted ?? false,
    },
  };
}

function failed(err: unknown, signal?: AbortSignal): StageReport {
  return {
    outcome: signal?.aborted ? "cancelled" : "failure",
    error: errorMessage(err),
  };
}

/**
 * Run the pipeline for a trigger event.  Stage failures are recorded in
 * the report rather than thrown; nothing is retried.
 */
export async function runPipeline(
  spec: DocsPipelineSpec,
  event: TriggerEvent,
  stages: PipelineStages,
  options: PipelineOptions,
): Promise<PipelineReport> {
  const { signal } = options;
  const log = (options.log ?? logger).child({ pipeline: spec.key, ref: event.ref });

  const plan = planPipeline(spec, event);
  const artifacts = stages.artifacts.scope(options.runId ?? randomUUID());
  const report: PipelineReport = {
    plan,
    stages: { build: skipped(), publish: skipped(), invalidate: skipped() },
    published: [],
    conclusion: "skipped",
  };

  if (!plan.build) {
    log.info("no documentation changes, nothing to build");
    return report;
  }

  // build and package
  const buildLog = log.child({ stage: "build" });
  if (signal?.aborted) {
    report.stages.build = { outcome: "cancelled" };
  } else if (plan.releaseVersion === null) {
    report.stages.build = failed(new ReleaseVersionError(event.ref));
  } else {
    try {
      const out = await buildDocs(spec, plan.releaseVersion, {
        root: options.root,
        runner: stages.runner,
        signal,
        log: buildLog,
      });
      const files = await artifacts.upload(plan.artifact, out);
      buildLog.info("artifact packaged", { artifact: plan.artifact, files: files.length });
      report.stages.build = { outcome: "success" };
    } catch (err) {
      report.stages.build = failed(err, signal);
    }
  }
  if (report.stages.build.error) {
    buildLog.error("build failed", { error: report.stages.build.error });
  }

  // publish
  const publishLog = log.child({ stage: "publish" });
  if (report.stages.build.outcome != "success") {
    publishLog.info("build did not succeed, not publishing");
  } else if (!plan.publish) {
    publishLog.info("ref is not published", { ref: event.ref });
  } else {
    const steps: Record<string, Outcome> = {};
    let source: string | undefined;
    try {
      source = await artifacts.download(plan.artifact);
      steps.download = "success";
    } catch (err) {
      steps.download = "failure";
      report.stages.publish = failed(err, signal);
    }

    if (source && shouldRun(uploadCondition(), stepContext(steps, signal))) {
      try {
        report.published = await syncDirectory(
          stages.store,
          source,
          spec.url_dest_dir,
          { signal, log: publishLog },
        );
        report.stages.publish = { outcome: "success" };
      } catch (err) {
        report.stages.publish = failed(err, signal);
      }
    } else if (source) {
      report.stages.publish = { outcome: "cancelled" };
    }
    if (report.stages.publish.error) {
      publishLog.error("publish failed", { error: report.stages.publish.error });
    }
  }

  // the artifact is consumed by the publish stage, or by nothing
  try {
    await artifacts.clear();
  } catch (err) {
    log.warn("could not remove run artifacts", {
      dir: artifacts.root,
      error: errorMessage(err),
    });
  }

  // invalidate
  const cdnLog = log.child({ stage: "invalidate" });
  const published = stepContext({ publish: report.stages.publish.outcome }, signal);
  if (shouldRun(invalidateCondition(), published)) {
    try {
      report.invalidationId = await stages.cdn.invalidate([plan.invalidation]);
      report.stages.invalidate = { outcome: "success" };
      cdnLog.info("invalidation requested", {
        path: plan.invalidation,
        id: report.invalidationId,
      });
    } catch (err) {
      report.stages.invalidate = failed(err, signal);
      cdnLog.warn("invalidation failed; cached pages may be stale", {
        error: report.stages.invalidate.error,
      });
    }
  }

  report.conclusion = conclude(report);
  log.info("pipeline finished", { conclusion: report.conclusion });
  return report;
}

function conclude(report: PipelineReport): Outcome {
  const { build, publish, invalidate } = report.stages;
  if ([build, publish, invalidate].some((s) => s.outcome == "cancelled")) {
    return "cancelled";
  }
  if (build.outcome == "failure" || publish.outcome == "failure") {
    return "failure";
  }
  return "success";
}

/**
 * Allows one in-flight run per ref.  Starting a run aborts the run
 * already in progress for the same ref.
 */
export class RefConcurrency {
  private readonly running = new Map<string, AbortController>();

  async run<T>(ref: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    this.running.get(ref)?.abort(new Error(`superseded by a newer run of ${ref}`));
    const controller = new AbortController();
    this.running.set(ref, controller);
    try {
      return await fn(controller.signal);
    } finally {
      if (this.running.get(ref) === controller) {
        this.running.delete(ref);
      }
    }
  }

  active(): string[] {
    return [...this.running.keys()];
  }
}
