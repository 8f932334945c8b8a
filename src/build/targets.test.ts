import { describe, it, expect } from "vitest";

import { resolveAssetPath } from "../utils/asset-root.js";
import {
  matchingConditions,
  parseBuildTargets,
  readBuildTargets,
  resolveAllTargets,
  resolveTargetFlags
} from "./targets.js";
import type { BuildTargetDecl } from "./types.js";

const customOps = () => readBuildTargets(resolveAssetPath("examples", "custom_ops.targets.json"));

const target = (overrides: Partial<BuildTargetDecl> & { name: string }): BuildTargetDecl => ({
  kind: "library",
  srcs: [`${overrides.name}.cc`],
  deps: [],
  copts: { default: [] },
  ...overrides
});

const document = (targets: BuildTargetDecl[]) => ({
  platform_conditions: { windows: { constraint: "@bazel_tools//platforms:windows" } },
  targets
});

describe("resolveTargetFlags", () => {
  it("selects the windows flags on win32", () => {
    const resolved = resolveTargetFlags(customOps(), "box_util", "win32");

    expect(resolved.condition).toBe("windows");
    expect(resolved.defines).toEqual([
      "EIGEN_STRONG_INLINE=inline",
      "TENSORFLOW_MONOLITHIC_BUILD",
      "PLATFORM_WINDOWS",
      "EIGEN_HAS_C99_MATH",
      "TENSORFLOW_USE_EIGEN_THREADPOOL",
      "EIGEN_AVOID_STL_ARRAY",
      "NOGDI"
    ]);
    expect(resolved.undefines).toEqual(["TF_COMPILE_LIBRARY"]);
    expect(resolved.includeDirs).toEqual(["external/gemmlowp"]);
    expect(resolved.suppressedWarnings).toEqual(["4018", "4577"]);
  });

  it("falls back to the default branch elsewhere", () => {
    for (const platform of ["linux", "darwin"] as const) {
      const resolved = resolveTargetFlags(customOps(), "box_util", platform);
      expect(resolved.condition).toBe("default");
      expect(resolved.copts).toEqual(["-pthread", "-std=c++17"]);
      expect(resolved.defines).toEqual([]);
    }
  });

  it("resolves features and local dependencies of the shared object", () => {
    const onWindows = resolveTargetFlags(customOps(), ":_custom_ops.so", "win32");
    expect(onWindows.features).toEqual(["windows_export_all_symbols"]);
    expect(onWindows.localDeps).toEqual(["box_util"]);

    expect(resolveTargetFlags(customOps(), "_custom_ops.so", "linux").features).toEqual([]);
  });

  it("names the known targets for an unknown one", () => {
    expect(() => resolveTargetFlags(customOps(), "nms", "linux")).toThrow(
      "Unknown build target: nms (known: box_util, _custom_ops.so)"
    );
  });
});

describe("matchingConditions", () => {
  it("matches constraints by their platform name", () => {
    expect(matchingConditions(customOps(), "win32")).toEqual(["windows"]);
    expect(matchingConditions(customOps(), "linux")).toEqual([]);
  });
});

describe("resolveAllTargets", () => {
  it("orders local dependencies first", () => {
    const doc = parseBuildTargets(
      document([
        target({ name: "ops.so", kind: "shared_object", linkshared: true, deps: [":util"] }),
        target({ name: "util" })
      ])
    );
    expect(resolveAllTargets(doc, "linux").map((resolved) => resolved.name)).toEqual(["util", "ops.so"]);
  });

  it("reports dependency cycles", () => {
    const doc = parseBuildTargets(
      document([target({ name: "a", deps: [":b"] }), target({ name: "b", deps: [":a"] })])
    );
    expect(() => resolveAllTargets(doc, "linux")).toThrow("Dependency cycle: a -> b -> a");
  });
});

describe("parseBuildTargets", () => {
  it("lists every semantic problem", () => {
    const invalid = document([
      target({ name: "util", deps: [":util", ":missing"] }),
      target({ name: "util" }),
      target({ name: "ops.so", kind: "shared_object", copts: { macos: ["-O2"] } })
    ]);

    expect(() => parseBuildTargets(invalid)).toThrow(
      [
        "Invalid build targets:",
        "- duplicate target name: util",
        "- util: depends on itself",
        "- util: unknown local dependency :missing",
        '- ops.so: copts has no "default" branch',
        "- ops.so: copts uses undeclared condition macos",
        "- ops.so: shared_object targets must set linkshared"
      ].join("\n")
    );
  });

  it("rejects targets without sources", () => {
    expect(() => parseBuildTargets(document([target({ name: "util", srcs: [] })]))).toThrow(
      "build_targets/targets/0/srcs: must NOT have fewer than 1 items"
    );
  });

  it("rejects a condition named default", () => {
    const invalid = { platform_conditions: { default: { constraint: "x" } }, targets: [target({ name: "util" })] };
    expect(() => parseBuildTargets(invalid)).toThrow("build_targets/platform_conditions: must NOT be valid");
  });
});
