// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * Types for the subset of the GitHub Actions workflow syntax these
 * pipelines emit.
 * @module
 */

export type EnvValue = string | number | boolean;
export type Env = Record<string, EnvValue>;

export interface PushTrigger {
  branches?: string[];
  tags?: string[];
  paths?: string[];
  "paths-ignore"?: string[];
}

export interface WorkflowTriggers {
  push?: PushTrigger;
  pull_request?: PushTrigger;
  workflow_dispatch?: Record<string, never>;
}

export interface Concurrency {
  group: string;
  "cancel-in-progress"?: boolean;
}

export interface WorkflowStep {
  id?: string;
  name?: string;
  if?: string;
  uses?: string;
  run?: string;
  shell?: string;
  "working-directory"?: string;
  with?: Record<string, EnvValue>;
  env?: Env;
  "continue-on-error"?: boolean;
  "timeout-minutes"?: number;
}

export interface WorkflowJob {
  name?: string;
  "runs-on": string;
  container?: string;
  needs?: string[];
  if?: string;
  env?: Env;
  "timeout-minutes"?: number;
  steps: WorkflowStep[];
}

export interface Workflow {
  name: string;
  on: WorkflowTriggers;
  env?: Env;
  concurrency?: Concurrency;
  permissions?: Record<string, "read" | "write" | "none">;
  jobs: Record<string, WorkflowJob>;
}
