import { describe, test, expect } from "vitest";
import { parseTarget, targetsOfKind, targetCandidates, resolveTarget } from "./targets";
import { InvalidSelectionError } from "#/errors";
import type { PackageRecord } from "#/manifest";
import { createMockPrompter } from "#/test-utils/mocks";

const pkg: PackageRecord = {
  name: "web",
  version: "1.0.0",
  targets: ["web:lib", "web:exe:web-server", "web:exe:web-admin", "web:test:web-spec", "web:bench:web-bench"],
  directory: "/work/web",
  manifestPath: "/work/web/web.cabal",
  manifestModTime: 1000,
};

describe("parseTarget", () => {
  test("parses component targets", () => {
    expect(parseTarget("web:exe:web-server")).toEqual({ packageName: "web", kind: "exe", component: "web-server" });
    expect(parseTarget("web:bench:b")).toEqual({ packageName: "web", kind: "bench", component: "b" });
  });

  test("parses library targets", () => {
    expect(parseTarget("web:lib")).toEqual({ packageName: "web", kind: "lib" });
  });

  test("rejects malformed targets", () => {
    expect(parseTarget("web")).toBeNull();
    expect(parseTarget("web:exe")).toBeNull();
    expect(parseTarget("web:lib:extra")).toBeNull();
    expect(parseTarget("web:foreign:x")).toBeNull();
    expect(parseTarget("web:exe:a:b")).toBeNull();
  });
});

describe("targetsOfKind", () => {
  test("filters targets by kind", () => {
    expect(targetsOfKind(pkg, "exe")).toEqual(["web:exe:web-server", "web:exe:web-admin"]);
    expect(targetsOfKind(pkg, "test")).toEqual(["web:test:web-spec"]);
  });
});

describe("targetCandidates", () => {
  test("offers the package name and every target", () => {
    expect(targetCandidates(pkg)).toEqual(["web", ...pkg.targets]);
  });

  test("fragment filters targets but never the package name", () => {
    expect(targetCandidates(pkg, "admin")).toEqual(["web", "web:exe:web-admin"]);
    expect(targetCandidates(pkg, "nothing-matches")).toEqual(["web"]);
  });
});

describe("resolveTarget", () => {
  test("auto mode returns the package name without prompting", async () => {
    const prompter = createMockPrompter({ choices: ["web:lib"] });

    const target = await resolveTarget(pkg, { autoMode: true, prompter });

    expect(target).toBe("web");
    expect(prompter.calls).toEqual([]);
  });

  test("asks the prompter with filtered candidates", async () => {
    const prompter = createMockPrompter({ choices: ["web:exe:web-server"] });

    const target = await resolveTarget(pkg, { autoMode: false, fragment: "exe", prompter });

    expect(target).toBe("web:exe:web-server");
    expect(prompter.calls).toEqual([
      {
        method: "select",
        prompt: "Target in web",
        candidates: ["web", "web:exe:web-server", "web:exe:web-admin"],
        options: { requireMatch: true },
      },
    ]);
  });

  test("rejects a choice outside the candidates", async () => {
    const prompter = createMockPrompter({ choices: ["web:test:web-spec"] });

    await expect(resolveTarget(pkg, { autoMode: false, fragment: "exe", prompter })).rejects.toBeInstanceOf(
      InvalidSelectionError
    );
  });
});
