// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import { MAIN_REF, SECRETS, SPHINX_IMAGE, STATIC_FILES } from "../lib/defs.ts";

/**
 * One documentation set, published under its own bucket prefix.
 */
export interface DocsPipelineSpec {
  /** Workflow file name, also used for the concurrency group. */
  key: string;
  title: string;
  crate: string;
  docs_dir: string;
  /** Bucket prefix without a leading `/` and with a trailing `/`. */
  url_dest_dir: string;
  default_release: string;
  tag_refs_filter: string;
  main_ref?: string;
  image?: string;
  requirements?: string;
  static_files?: string[];
  secrets?: typeof SECRETS;
}

export function docsSpec(
  options: Omit<DocsPipelineSpec, "key" | "title"> & {
    key?: string;
    title?: string;
  },
): DocsPipelineSpec {
  if (!options.url_dest_dir.endsWith("/") || options.url_dest_dir.startsWith("/")) {
    throw new Error(
      `destination ${options.url_dest_dir} must have a trailing / and no leading /`,
    );
  }
  if (!options.crate) {
    throw new Error("crate identifier must not be empty");
  }
  if (!options.default_release) {
    throw new Error("default release version must not be empty");
  }
  const label = options.crate[0].toUpperCase() + options.crate.slice(1);
  return {
    key: `docs-${options.crate}`,
    title: `Docs - ${label}`,
    main_ref: MAIN_REF,
    image: SPHINX_IMAGE,
    requirements: "requirements.txt",
    static_files: STATIC_FILES,
    secrets: SECRETS,
    ...options,
  };
}

export function artifactName(spec: DocsPipelineSpec): string {
  return `docs-${spec.crate}`;
}

export function mainRef(spec: DocsPipelineSpec): string {
  return spec.main_ref ?? MAIN_REF;
}

export function docRootUrl(spec: DocsPipelineSpec): string {
  return "/" + spec.url_dest_dir;
}

export function invalidationPath(spec: DocsPipelineSpec): string {
  return "/" + spec.url_dest_dir + "*";
}

export function docsPathFilter(spec: DocsPipelineSpec): string {
  return `${spec.docs_dir}/**`;
}

export function secretNames(spec: DocsPipelineSpec): typeof SECRETS {
  return spec.secrets ?? SECRETS;
}

/** Directory under the docs source that receives the rendered site. */
export const BUILD_DIR = "build";
