// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import type { WorkflowStep } from "./github.ts";
import { ACTIONS } from "./defs.ts";

export function checkoutStep(depth: number = 1): WorkflowStep {
  return {
    name: "🛒 Checkout",
    uses: ACTIONS.checkout,
    with: { "fetch-depth": depth },
  };
}
