// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import { readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { PutObjectCommand } from "@aws-sdk/client-s3";

import { ACTIONS, RUNNER } from "../lib/defs.ts";
import { errorMessage, PublishError } from "../lib/errors.ts";
import {
  and,
  cancelled,
  ctx,
  eq,
  type Expr,
  lit,
  not,
  render,
  wrap,
} from "../lib/expr.ts";
import type { WorkflowJob } from "../lib/github.ts";
import { logger, type Logger } from "../lib/log.ts";
import { listFiles } from "./artifact.ts";
import { invalidateStep } from "./invalidate.ts";
import { type DocsPipelineSpec, secretNames } from "./spec.ts";
import { publishCondition } from "./trigger.ts";

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".json": "application/json",
  ".txt": "text/plain; charset=utf-8",
  ".xml": "application/xml",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".ico": "image/x-icon",
  ".woff": "font/woff",
  ".woff2": "font/woff2",
  ".ttf": "font/ttf",
};

export function contentType(path: string): string {
  return CONTENT_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}

export interface PutRequest {
  key: string;
  body: Uint8Array;
  contentType: string;
  signal?: AbortSignal;
}

/**
 * Destination for published files.
 */
export interface ObjectStore {
  put(request: PutRequest): Promise<void>;
}

/** The part of `S3Client` the store uses. */
export interface PutObjectClient {
  send(
    command: PutObjectCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<unknown>;
}

/**
 * Writes objects to an S3 bucket, readable by anyone.
 */
export class S3ObjectStore implements ObjectStore {
  private readonly client: PutObjectClient;
  readonly bucket: string;

  constructor(client: PutObjectClient, bucket: string) {
    this.client = client;
    this.bucket = bucket;
  }

  async put(request: PutRequest): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: request.key,
        Body: request.body,
        ContentType: request.contentType,
        ACL: "public-read",
      }),
      { abortSignal: request.signal },
    );
  }
}

export interface SyncOptions {
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * Mirror a directory tree into the store under a key prefix.  Existing
 * objects are overwritten and nothing is deleted.
 * @returns The keys written, in upload order.
 */
export async function syncDirectory(
  store: ObjectStore,
  source: string,
  prefix: string,
  options: SyncOptions = {},
): Promise<string[]> {
  const log = options.log ?? logger.child({ stage: "publish" });
  const files = await listFiles(source);
  const keys: string[] = [];

  for (const file of files) {
    options.signal?.throwIfAborted();
    const key = prefix + file;
    try {
      await store.put({
        key,
        body: await readFile(join(source, file)),
        contentType: contentType(file),
        signal: options.signal,
      });
    } catch (err) {
      // objects already written stay in place
      throw new PublishError(
        `upload of ${key} failed after ${keys.length} of ${files.length} files: ${
          errorMessage(err)
        }`,
        { cause: err },
      );
    }
    log.debug("uploaded", { key });
    keys.push(key);
  }

  log.info("sync complete", { prefix, files: keys.length });
  return keys;
}

/** Whether the sync step runs, given the download step's outcome. */
export function uploadCondition(): Expr {
  return and(eq(ctx("steps.download.outcome"), lit("success")), not(cancelled()));
}

function secret(name: string): string {
  return wrap(ctx(`secrets.${name}`));
}

export function publishDocsJob(spec: DocsPipelineSpec, needs: string[]): WorkflowJob {
  const secrets = secretNames(spec);
  return {
    name: `Publish ${spec.crate} documentation`,
    "runs-on": RUNNER,
    needs,
    if: render(publishCondition(spec)),
    steps: [
      {
        name: "📥 Download documentation",
        id: "download",
        uses: ACTIONS.download,
        with: { name: "docs-${{env.crate}}" },
      },
      {
        name: "🪣 Publish documentation to S3",
        id: "publish",
        if: render(uploadCondition()),
        uses: ACTIONS.s3Sync,
        with: { args: "--acl public-read" },
        env: {
          AWS_S3_BUCKET: secret(secrets.bucket),
          AWS_ACCESS_KEY_ID: secret(secrets.accessKeyId),
          AWS_SECRET_ACCESS_KEY: secret(secrets.secretAccessKey),
          AWS_REGION: secret(secrets.region),
          SOURCE_DIR: ".",
          DEST_DIR: "${{env.url_dest_dir}}",
        },
      },
      invalidateStep(spec),
    ],
  };
}
