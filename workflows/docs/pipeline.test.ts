import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CORE_DOCS } from "../docs.ts";
import { setLogHandler } from "../lib/log.ts";
import { ArtifactStore, listFiles } from "./artifact.ts";
import type { CommandRunner } from "./build.ts";
import { FakeCdn, FakeSphinx, MemoryStore, writeDocsSources } from "./fakes.ts";
import { planPipeline, RefConcurrency, runPipeline } from "./pipeline.ts";
import type { ObjectStore } from "./publish.ts";

const DOC_CHANGE = "concrete-core/docs/index.rst";

/** An artifact store whose run scopes cannot be removed. */
class StickyArtifacts extends ArtifactStore {
  scope(run: string): ArtifactStore {
    return new StickyArtifacts(join(this.root, run));
  }

  async clear(): Promise<void> {
    throw new Error("EBUSY: resource busy");
  }
}

function push(ref: string, ...changedPaths: string[]) {
  return { name: "push", ref, changedPaths };
}

describe("planPipeline", () => {
  it("plans a release tag", () => {
    expect(planPipeline(CORE_DOCS, push("refs/tags/concrete-core-1.4.0", DOC_CHANGE)))
      .toEqual({
        ref: "refs/tags/concrete-core-1.4.0",
        build: true,
        publish: true,
        releaseVersion: "1.4.0",
        artifact: "docs-core",
        destination: "concrete/core-lib/1.4.0/",
        invalidation: "/concrete/core-lib/*",
      });
  });

  it("labels a mixed-case release tag with its version", () => {
    const plan = planPipeline(CORE_DOCS, push("refs/tags/Concrete-Core-2.0.0", DOC_CHANGE));
    expect(plan.publish).toBe(true);
    expect(plan.releaseVersion).toBe("2.0.0");
    expect(plan.destination).toBe("concrete/core-lib/2.0.0/");
  });

  it("has no destination for a bare tag prefix", () => {
    const plan = planPipeline(CORE_DOCS, push("refs/tags/concrete-core-", DOC_CHANGE));
    expect(plan.releaseVersion).toBe(null);
    expect(plan.destination).toBe(null);
  });
});

describe("runPipeline", () => {
  let root: string;
  let runner: FakeSphinx;
  let artifacts: ArtifactStore;
  let store: MemoryStore;
  let cdn: FakeCdn;

  beforeEach(async () => {
    setLogHandler(() => {});
    root = await mkdtemp(join(tmpdir(), "docs-pipeline-"));
    await writeDocsSources(root, CORE_DOCS.docs_dir);
    runner = new FakeSphinx();
    artifacts = new ArtifactStore(join(root, ".artifacts"));
    store = new MemoryStore();
    cdn = new FakeCdn();
  });

  afterEach(async () => {
    setLogHandler(null);
    await rm(root, { recursive: true, force: true });
  });

  function run(ref: string, ...paths: string[]) {
    return runPipeline(
      CORE_DOCS,
      push(ref, ...paths),
      { runner, artifacts, store, cdn },
      { root },
    );
  }

  it("publishes a release tag under its version", async () => {
    const report = await run("refs/tags/concrete-core-1.4.0", DOC_CHANGE);

    expect(report.conclusion).toBe("success");
    expect(report.stages).toEqual({
      build: { outcome: "success" },
      publish: { outcome: "success" },
      invalidate: { outcome: "success" },
    });
    expect(report.published).toEqual([
      "concrete/core-lib/1.4.0/index.html",
      "concrete/core-lib/index.html",
      "concrete/core-lib/versions.json",
    ]);
    expect(store.keys()).toEqual(report.published);
    expect(cdn.requests).toEqual([["/concrete/core-lib/*"]]);
    expect(report.invalidationId).toBe("INV1");
  });

  it("publishes the main line under the default version", async () => {
    const report = await run("refs/heads/main", DOC_CHANGE);

    expect(report.plan.releaseVersion).toBe("main");
    expect(report.published).toEqual([
      "concrete/core-lib/index.html",
      "concrete/core-lib/main/index.html",
      "concrete/core-lib/versions.json",
    ]);
    expect(cdn.requests).toEqual([["/concrete/core-lib/*"]]);
  });

  it("consumes the artifact once published", async () => {
    await run("refs/heads/main", DOC_CHANGE);
    expect(await listFiles(artifacts.root)).toEqual([]);
  });

  it("removes the artifact of a build that is not published", async () => {
    await run("refs/heads/feature", DOC_CHANGE);
    expect(await listFiles(artifacts.root)).toEqual([]);
  });

  it("packages each run under its own id", async () => {
    const report = await runPipeline(
      CORE_DOCS,
      push("refs/heads/main", DOC_CHANGE),
      { runner, artifacts, store, cdn },
      { root, runId: "run-1" },
    );
    expect(report.conclusion).toBe("success");
    await expect(artifacts.scope("run-1").download("docs-core")).rejects.toThrow(
      /^artifact docs-core not found/,
    );
  });

  it("keeps a mixed-case release tag out of the main line", async () => {
    const report = await run("refs/tags/Concrete-Core-2.0.0", DOC_CHANGE);

    expect(report.conclusion).toBe("success");
    expect(report.published).toEqual([
      "concrete/core-lib/2.0.0/index.html",
      "concrete/core-lib/index.html",
      "concrete/core-lib/versions.json",
    ]);
  });

  it("still invalidates when the artifact cannot be removed", async () => {
    const report = await runPipeline(
      CORE_DOCS,
      push("refs/heads/main", DOC_CHANGE),
      { runner, artifacts: new StickyArtifacts(join(root, ".artifacts")), store, cdn },
      { root },
    );

    expect(report.conclusion).toBe("success");
    expect(report.stages.invalidate).toEqual({ outcome: "success" });
    expect(cdn.requests).toEqual([["/concrete/core-lib/*"]]);
  });

  it("does nothing for pushes outside the docs", async () => {
    const report = await run("refs/heads/main", "concrete-core/src/lib.rs");

    expect(report.conclusion).toBe("skipped");
    expect(report.stages.build.outcome).toBe("skipped");
    expect(runner.calls).toEqual([]);
    expect(store.keys()).toEqual([]);
  });

  it("builds but does not publish other branches", async () => {
    const report = await run("refs/heads/feature", DOC_CHANGE);

    expect(report.conclusion).toBe("success");
    expect(report.stages).toEqual({
      build: { outcome: "success" },
      publish: { outcome: "skipped" },
      invalidate: { outcome: "skipped" },
    });
    expect(store.keys()).toEqual([]);
    expect(cdn.requests).toEqual([]);
  });

  it("publishes nothing when the build fails", async () => {
    runner.failWith = new Error("sphinx-build exited with status 2");
    const report = await run("refs/heads/main", DOC_CHANGE);

    expect(report.conclusion).toBe("failure");
    expect(report.stages).toEqual({
      build: { outcome: "failure", error: "sphinx-build exited with status 2" },
      publish: { outcome: "skipped" },
      invalidate: { outcome: "skipped" },
    });
    expect(store.keys()).toEqual([]);
    expect(cdn.requests).toEqual([]);
  });

  it("fails the build for a tag without a version", async () => {
    const report = await run("refs/tags/concrete-core-", DOC_CHANGE);

    expect(report.stages.build).toEqual({
      outcome: "failure",
      error: "ref refs/tags/concrete-core- yields an empty release version",
    });
    expect(runner.calls).toEqual([]);
  });

  it("skips invalidation when the publish fails", async () => {
    store.failOn = "concrete/core-lib/main/index.html";
    const report = await run("refs/heads/main", DOC_CHANGE);

    expect(report.conclusion).toBe("failure");
    expect(report.stages.publish.outcome).toBe("failure");
    expect(report.stages.invalidate.outcome).toBe("skipped");
    expect(store.keys()).toEqual(["concrete/core-lib/index.html"]);
    expect(cdn.requests).toEqual([]);
  });

  it("reports a failed invalidation without failing the run", async () => {
    cdn.fail = true;
    const report = await run("refs/heads/main", DOC_CHANGE);

    expect(report.conclusion).toBe("success");
    expect(report.stages.publish.outcome).toBe("success");
    expect(report.stages.invalidate).toEqual({ outcome: "failure", error: "throttled" });
    expect(report.invalidationId).toBeUndefined();
  });
});

describe("RefConcurrency", () => {
  let root: string;

  beforeEach(async () => {
    setLogHandler(() => {});
    root = await mkdtemp(join(tmpdir(), "docs-concurrency-"));
    await writeDocsSources(root, CORE_DOCS.docs_dir);
  });

  afterEach(async () => {
    setLogHandler(null);
    await rm(root, { recursive: true, force: true });
  });

  it("cancels the older run for the same ref", async () => {
    let started: () => void = () => {};
    const blocked = new Promise<void>((resolve) => {
      started = resolve;
    });
    const hanging: CommandRunner = {
      run: (_cmd, { signal }) =>
        new Promise((_resolve, reject) => {
          started();
          const abort = signal;
          if (abort) {
            abort.addEventListener("abort", () => reject(abort.reason));
          }
        }),
    };
    const store = new MemoryStore();
    const cdn = new FakeCdn();
    const artifacts = new ArtifactStore(join(root, ".artifacts"));
    const event = push("refs/heads/main", DOC_CHANGE);
    const gate = new RefConcurrency();

    const first = gate.run(event.ref, (signal) =>
      runPipeline(CORE_DOCS, event, { runner: hanging, artifacts, store, cdn }, {
        root,
        signal,
      })
    );
    await blocked;
    expect(gate.active()).toEqual(["refs/heads/main"]);

    const second = gate.run(event.ref, (signal) =>
      runPipeline(
        CORE_DOCS,
        event,
        { runner: new FakeSphinx(), artifacts, store, cdn },
        { root, signal },
      )
    );

    const [old, current] = await Promise.all([first, second]);
    expect(old.conclusion).toBe("cancelled");
    expect(old.stages.build).toEqual({
      outcome: "cancelled",
      error: "superseded by a newer run of refs/heads/main",
    });
    expect(old.stages.publish.outcome).toBe("skipped");
    expect(current.conclusion).toBe("success");
    expect(cdn.requests).toEqual([["/concrete/core-lib/*"]]);
    expect(gate.active()).toEqual([]);
  });

  it("lets the newer run publish when the older one is cancelled mid-upload", async () => {
    let entered: () => void = () => {};
    const uploading = new Promise<void>((resolve) => {
      entered = resolve;
    });
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const store = new MemoryStore();
    const slow: ObjectStore = {
      put: async (request) => {
        entered();
        await held;
        await store.put(request);
      },
    };
    const cdn = new FakeCdn();
    const artifacts = new ArtifactStore(join(root, ".artifacts"));
    const event = push("refs/heads/main", DOC_CHANGE);
    const gate = new RefConcurrency();

    const first = gate.run(event.ref, (signal) =>
      runPipeline(
        CORE_DOCS,
        event,
        { runner: new FakeSphinx(), artifacts, store: slow, cdn },
        { root, signal },
      )
    );
    await uploading;

    const second = gate.run(event.ref, (signal) =>
      runPipeline(
        CORE_DOCS,
        event,
        { runner: new FakeSphinx(), artifacts, store, cdn },
        { root, signal },
      )
    );
    release();

    const [old, current] = await Promise.all([first, second]);
    expect(old.conclusion).toBe("cancelled");
    expect(old.stages.build.outcome).toBe("success");
    expect(old.stages.publish).toEqual({
      outcome: "cancelled",
      error: "superseded by a newer run of refs/heads/main",
    });
    expect(old.stages.invalidate.outcome).toBe("skipped");
    expect(current.conclusion).toBe("success");
    expect(current.published).toEqual([
      "concrete/core-lib/index.html",
      "concrete/core-lib/main/index.html",
      "concrete/core-lib/versions.json",
    ]);
    expect(cdn.requests).toEqual([["/concrete/core-lib/*"]]);
    expect(await listFiles(artifacts.root)).toEqual([]);
  });

  it("runs different refs side by side", async () => {
    const gate = new RefConcurrency();
    const signals: AbortSignal[] = [];
    let release: () => void = () => {};
    const hold = new Promise<void>((resolve) => {
      release = resolve;
    });

    const a = gate.run("refs/heads/main", async (signal) => {
      signals.push(signal);
      await hold;
    });
    const b = gate.run("refs/tags/concrete-core-1.0", async (signal) => {
      signals.push(signal);
      await hold;
    });
    expect(gate.active()).toEqual(["refs/heads/main", "refs/tags/concrete-core-1.0"]);
    release();
    await Promise.all([a, b]);

    expect(signals.map((s) => s.aborted)).toEqual([false, false]);
  });
});
