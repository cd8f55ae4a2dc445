// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import { CreateInvalidationCommand } from "@aws-sdk/client-cloudfront";

import { ACTIONS } from "../lib/defs.ts";
import { InvalidationError } from "../lib/errors.ts";
import { ctx, eq, type Expr, lit, render, wrap } from "../lib/expr.ts";
import type { WorkflowStep } from "../lib/github.ts";
import { type DocsPipelineSpec, secretNames } from "./spec.ts";

export interface CdnInvalidator {
  /**
   * Request eviction of cached objects.  Does not wait for the
   * invalidation to complete.
   * @returns The provider's invalidation id.
   */
  invalidate(paths: string[]): Promise<string>;
}

/** The part of `CloudFrontClient` the invalidator uses. */
export interface InvalidationClient {
  send(
    command: CreateInvalidationCommand,
  ): Promise<{ Invalidation?: { Id?: string } }>;
}

export class CloudFrontInvalidator implements CdnInvalidator {
  private readonly client: InvalidationClient;
  readonly distributionId: string;
  private readonly clock: () => number;

  constructor(
    client: InvalidationClient,
    distributionId: string,
    clock: () => number = Date.now,
  ) {
    this.client = client;
    this.distributionId = distributionId;
    this.clock = clock;
  }

  async invalidate(paths: string[]): Promise<string> {
    const res = await this.client.send(
      new CreateInvalidationCommand({
        DistributionId: this.distributionId,
        InvalidationBatch: {
          CallerReference: `docs-${this.clock()}`,
          Paths: { Quantity: paths.length, Items: paths },
        },
      }),
    );
    const id = res.Invalidation?.Id;
    if (!id) {
      throw new InvalidationError(
        `distribution ${this.distributionId} returned no invalidation id`,
      );
    }
    return id;
  }
}

/** Whether the invalidation runs, given the publish step's outcome. */
export function invalidateCondition(): Expr {
  return eq(ctx("steps.publish.outcome"), lit("success"));
}

export function invalidateStep(spec: DocsPipelineSpec): WorkflowStep {
  const secrets = secretNames(spec);
  return {
    name: "🧹 Invalidate CloudFront cache",
    if: render(invalidateCondition()),
    uses: ACTIONS.cloudfront,
    // a failed invalidation leaves the publish in place
    "continue-on-error": true,
    env: {
      SOURCE_PATH: "/${{env.url_dest_dir}}*",
      AWS_REGION: wrap(ctx(`secrets.${secrets.region}`)),
      AWS_ACCESS_KEY_ID: wrap(ctx(`secrets.${secrets.accessKeyId}`)),
      AWS_SECRET_ACCESS_KEY: wrap(ctx(`secrets.${secrets.secretAccessKey}`)),
      DISTRIBUTION_ID: wrap(ctx(`secrets.${secrets.distributionId}`)),
    },
  };
}
