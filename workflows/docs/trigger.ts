// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * Trigger evaluation: whether an event builds the docs, whether the result
 * is published, and which release version it is filed under.
 * @module
 */

import { z } from "zod";

import { ReleaseVersionError } from "../lib/errors.ts";
import { and, ctx, eq, type Expr, lit, or, startsWith, test } from "../lib/expr.ts";
import { type DocsPipelineSpec, docsPathFilter, mainRef } from "./spec.ts";

export interface TriggerEvent {
  name: string;
  ref: string;
  changedPaths: string[];
}

/** Compile one GitHub path filter pattern to a regular expression. */
export function filterPattern(pattern: string): RegExp {
  let re = "";
  for (let i = 0; i < pattern.length; i++) {
    const c = pattern[i];
    if (c == "*") {
      if (pattern[i + 1] == "*") {
        i += 1;
        if (pattern[i + 1] == "/") {
          // `**/` also matches no directories at all
          i += 1;
          re += "(?:.*/)?";
        } else {
          re += ".*";
        }
      } else {
        re += "[^/]*";
      }
    } else if (c == "?") {
      re += "[^/]";
    } else {
      re += c.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${re}$`);
}

/**
 * Test a path against a list of filter patterns.  Patterns starting with
 * `!` exclude; the last pattern that matches decides.
 */
export function matchesFilters(filters: string[], path: string): boolean {
  let matched = false;
  for (const filter of filters) {
    const negated = filter.startsWith("!");
    const pattern = negated ? filter.slice(1) : filter;
    if (filterPattern(pattern).test(path)) {
      matched = !negated;
    }
  }
  return matched;
}

export function shouldBuild(spec: DocsPipelineSpec, event: TriggerEvent): boolean {
  if (event.name != "push") return false;
  const filters = [docsPathFilter(spec)];
  return event.changedPaths.some((p) => matchesFilters(filters, p));
}

/**
 * The condition under which a build is published.  The tag prefix is
 * written out literally because job-level conditions cannot read the
 * workflow's `env`.
 */
export function publishCondition(spec: DocsPipelineSpec): Expr {
  return and(
    eq(ctx("github.event_name"), lit("push")),
    or(
      startsWith(ctx("github.ref"), lit(spec.tag_refs_filter)),
      eq(ctx("github.ref"), lit(mainRef(spec))),
    ),
  );
}

export function tagCondition(): Expr {
  return startsWith(ctx("github.ref"), ctx("env.TAG_REFS_FILTER"));
}

export function shouldPublish(spec: DocsPipelineSpec, event: TriggerEvent): boolean {
  return test(publishCondition(spec), {
    contexts: { github: { event_name: event.name, ref: event.ref } },
  });
}

/**
 * Derive the release version label for a ref: the tag suffix for release
 * tags, the default label for everything else.  A release tag is matched
 * the way {@link tagCondition} matches it, ignoring case.
 */
export function releaseVersion(spec: DocsPipelineSpec, ref: string): string {
  const prefix = ref.slice(0, spec.tag_refs_filter.length);
  if (prefix.toLowerCase() != spec.tag_refs_filter.toLowerCase()) {
    return spec.default_release;
  }
  const version = ref.slice(spec.tag_refs_filter.length);
  if (!version) {
    throw new ReleaseVersionError(ref);
  }
  return version;
}

const FileChanges = z.object({
  added: z.array(z.string()).default([]),
  modified: z.array(z.string()).default([]),
  removed: z.array(z.string()).default([]),
});

const PushPayload = z.object({
  ref: z.string().min(1),
  commits: z.array(FileChanges).default([]),
  head_commit: FileChanges.nullish(),
});

/**
 * Read a trigger event from a GitHub event payload.
 */
export function parsePushEvent(payload: unknown, name = "push"): TriggerEvent {
  const push = PushPayload.parse(payload);
  const paths = new Set<string>();
  const commits = push.head_commit ? [...push.commits, push.head_commit] : push.commits;
  for (const commit of commits) {
    for (const p of [...commit.added, ...commit.modified, ...commit.removed]) {
      paths.add(p);
    }
  }
  return { name, ref: push.ref, changedPaths: [...paths].sort() };
}
