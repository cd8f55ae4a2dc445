// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * Definitions used for the other workflow modules.
 * @module
 */

export const RUNNER = "ubuntu-latest";
export const MAIN_REF = "refs/heads/main";
export const SPHINX_IMAGE = "sphinxdoc/sphinx:4.3.0";
export const STATIC_FILES = ["versions.json", "index.html"];

export const ACTIONS = {
  checkout: "actions/checkout@v4",
  upload: "actions/upload-artifact@v4",
  download: "actions/download-artifact@v4",
  s3Sync: "jakejarvis/s3-sync-action@be0c4ab89158cac4278689ebedd8407dd5f35a83",
  cloudfront: "awact/cloudfront-action@8bcfabc7b4bbc0cb8e55e48527f0e3a6d681627c",
};

export const SECRETS = {
  bucket: "AWS_REPO_DOCUMENTATION_BUCKET_NAME",
  accessKeyId: "AWS_IAM_ID",
  secretAccessKey: "AWS_IAM_KEY",
  region: "AWS_REGION",
  distributionId: "AWS_REPO_DOCUMENTATION_DISTRIBUTION_ID",
};
