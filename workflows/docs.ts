// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import type { Workflow } from "./lib/github.ts";

import { buildDocsJob } from "./docs/build.ts";
import { publishDocsJob } from "./docs/publish.ts";
import { type DocsPipelineSpec, docsPathFilter, docsSpec } from "./docs/spec.ts";

export const CORE_DOCS: DocsPipelineSpec = docsSpec({
  crate: "core",
  docs_dir: "concrete-core/docs",
  url_dest_dir: "concrete/core-lib/",
  default_release: "main",
  tag_refs_filter: "refs/tags/concrete-core-",
});

export function docsWorkflow(spec: DocsPipelineSpec): Workflow {
  return {
    name: spec.title,
    env: {
      crate: spec.crate,
      // source path to docs conf.py
      docs_dir: spec.docs_dir,
      url_dest_dir: spec.url_dest_dir,
      // overridden for release tags
      RELEASE_VERSION: spec.default_release,
      TAG_REFS_FILTER: spec.tag_refs_filter,
    },
    on: {
      push: {
        paths: [docsPathFilter(spec)],
      },
    },
    concurrency: {
      group: `${spec.key}-\${{github.ref}}`,
      "cancel-in-progress": true,
    },
    jobs: {
      "build-docs": buildDocsJob(spec),
      "publish-docs": publishDocsJob(spec, ["build-docs"]),
    },
  };
}

/** Every documentation pipeline, by workflow key. */
export const PIPELINES: Record<string, DocsPipelineSpec> = {
  [CORE_DOCS.key]: CORE_DOCS,
};
