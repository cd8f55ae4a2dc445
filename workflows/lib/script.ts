// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import { ok as assert } from "node:assert/strict";

/**
 * A program invocation, kept as separate words so it can be both
 * executed directly and written into a workflow script.
 */
export interface Command {
  program: string;
  args: string[];
}

export function script(...lines: string[]): string {
  let script = "";
  for (let line of lines) {
    // strip leading newlines
    line = line.replace(/^(\s*?\n)+/, "");
    // dedent by the first line's indent
    const m = line.match(/^ */);
    assert(m != null);
    const lead = m[0];
    if (lead.length) {
      line = line.replaceAll(new RegExp(`^ {${lead.length}}`, "gm"), "");
    }
    line = line.trimEnd();
    line += "\n";
    script += line;
  }
  return script;
}

const SAFE_WORD = /^[\w@%+=:,./${}#-]+$/;

/**
 * Quote a word for a POSIX shell.  Words that need no quoting, including
 * `${{...}}` expressions without spaces, pass through unchanged.
 */
export function shellWord(word: string): string {
  if (word.length && SAFE_WORD.test(word)) {
    return word;
  }
  return `'${word.replaceAll("'", `'\\''`)}'`;
}

export function commandLine(cmd: Command): string {
  return [cmd.program, ...cmd.args].map(shellWord).join(" ");
}
