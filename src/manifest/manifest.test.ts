import { describe, test, expect } from "vitest";
import {
  classifyLine,
  scanManifest,
  buildTargets,
  parseManifestText,
  parseManifest,
  fallbackRecord,
} from "./manifest";
import { ManifestNotFoundError } from "#/errors";
import { createMockFileSystem } from "#/test-utils/mocks";

const APP_MANIFEST = `cabal-version: 2.4
name:          my-app
version:       0.3.1.0
homepage:      https://example.com/my-app
build-type:    Simple

source-repository head
  type:     git
  location: https://example.com/my-app.git

executable my-app-server
  main-is: Server.hs

test-suite spec
  type:    exitcode-stdio-1.0
  main-is: Spec.hs

library
  exposed-modules: MyApp
  library-dirs:    lib

benchmark speed
  main-is: Bench.hs

executable my-app-cli
  main-is: Cli.hs
`;

describe("manifest", () => {
  describe("classifyLine", () => {
    test("recognises fields case-insensitively", () => {
      expect(classifyLine("Name: my-app")).toEqual({ kind: "field", field: "name", value: "my-app" });
      expect(classifyLine("VERSION:   1.0")).toEqual({ kind: "field", field: "version", value: "1.0" });
    });

    test("allows leading blanks", () => {
      expect(classifyLine("    location: git://host/repo")).toEqual({
        kind: "field",
        field: "location",
        value: "git://host/repo",
      });
    });

    test("does not treat prefixed keys as fields", () => {
      expect(classifyLine("cabal-version: 2.4")).toEqual({ kind: "other" });
      expect(classifyLine("package-name: x")).toEqual({ kind: "other" });
    });

    test("recognises library stanza but not library-dirs", () => {
      expect(classifyLine("library")).toEqual({ kind: "library" });
      expect(classifyLine("Library internal")).toEqual({ kind: "library" });
      expect(classifyLine("  library-dirs: lib")).toEqual({ kind: "other" });
    });

    test("recognises component stanzas with identifiers", () => {
      expect(classifyLine("executable server")).toEqual({ kind: "component", stanza: "executable", ident: "server" });
      expect(classifyLine("Test-Suite unit")).toEqual({ kind: "component", stanza: "test-suite", ident: "unit" });
      expect(classifyLine("benchmark  perf")).toEqual({ kind: "component", stanza: "benchmark", ident: "perf" });
    });

    test("component stanza without identifier is other", () => {
      expect(classifyLine("executable")).toEqual({ kind: "other" });
    });

    test("comments are never fields", () => {
      expect(classifyLine("-- name: commented-out")).toEqual({ kind: "comment" });
    });
  });

  describe("scanManifest", () => {
    test("collects fields and stanzas in file order", () => {
      const scan = scanManifest(APP_MANIFEST);

      expect(scan).toEqual({
        name: "my-app",
        version: "0.3.1.0",
        homepage: "https://example.com/my-app",
        location: "https://example.com/my-app.git",
        hasLibrary: true,
        executables: ["my-app-server", "my-app-cli"],
        testSuites: ["spec"],
        benchmarks: ["speed"],
      });
    });

    test("keeps the first value of a repeated field", () => {
      const scan = scanManifest("name: first\nname: second\n");
      expect(scan.name).toBe("first");
    });

    test("collects duplicate stanza identifiers", () => {
      const scan = scanManifest("executable a\nexecutable a\n");
      expect(scan.executables).toEqual(["a", "a"]);
    });

    test("handles CRLF line endings", () => {
      const scan = scanManifest("name: win\r\nversion: 1.0\r\nlibrary\r\n");
      expect(scan.name).toBe("win");
      expect(scan.version).toBe("1.0");
      expect(scan.hasLibrary).toBe(true);
    });
  });

  describe("buildTargets", () => {
    test("orders lib, exe, test, bench regardless of file order", () => {
      const targets = buildTargets(scanManifest(APP_MANIFEST));

      expect(targets).toEqual([
        "my-app:lib",
        "my-app:exe:my-app-server",
        "my-app:exe:my-app-cli",
        "my-app:test:spec",
        "my-app:bench:speed",
      ]);
    });

    test("library before executables even when declared after", () => {
      const targets = buildTargets(scanManifest("name: pkg\nexecutable e1\nexecutable e2\nlibrary\n"));
      expect(targets).toEqual(["pkg:lib", "pkg:exe:e1", "pkg:exe:e2"]);
    });

    test("no library stanza means no lib target", () => {
      const targets = buildTargets(scanManifest("name: tool\nexecutable tool\n"));
      expect(targets).toEqual(["tool:exe:tool"]);
    });
  });

  describe("parseManifestText", () => {
    test("assembles a package record", () => {
      const record = parseManifestText(APP_MANIFEST, "/work/my-app/my-app.cabal", 42);

      expect(record.name).toBe("my-app");
      expect(record.version).toBe("0.3.1.0");
      expect(record.directory).toBe("/work/my-app");
      expect(record.manifestPath).toBe("/work/my-app/my-app.cabal");
      expect(record.manifestModTime).toBe(42);
      expect(record.homepage).toBe("https://example.com/my-app");
      expect(record.repositoryLocation).toBe("https://example.com/my-app.git");
    });

    test("missing name and version become empty strings", () => {
      const record = parseManifestText("library\n", "/p/x.cabal", 1);

      expect(record.name).toBe("");
      expect(record.version).toBe("");
      expect(record.targets).toEqual([":lib"]);
    });

    test("empty field value is not taken as the name", () => {
      const record = parseManifestText("name:\nname: real\n", "/p/x.cabal", 1);
      expect(record.name).toBe("real");
    });
  });

  describe("parseManifest", () => {
    test("reads the file and records its modification time", () => {
      const fs = createMockFileSystem();
      fs.writeFile("/p/pkg.cabal", "name: pkg\nversion: 1.2\n", 5000);

      const record = parseManifest(fs, "/p/pkg.cabal");

      expect(record.name).toBe("pkg");
      expect(record.version).toBe("1.2");
      expect(record.manifestModTime).toBe(5000);
    });

    test("throws ManifestNotFoundError with the path for a missing file", () => {
      const fs = createMockFileSystem();

      expect(() => parseManifest(fs, "/p/missing.cabal")).toThrow(ManifestNotFoundError);
      expect(() => parseManifest(fs, "/p/missing.cabal")).toThrow("/p/missing.cabal");
    });
  });

  describe("fallbackRecord", () => {
    test("has empty name, version and targets", () => {
      expect(fallbackRecord("/p/broken.cabal")).toEqual({
        name: "",
        version: "",
        targets: [],
        directory: "/p",
        manifestPath: "/p/broken.cabal",
        manifestModTime: 0,
      });
    });
  });
});
