import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ConfigError,
  DEFAULT_CONFIG,
  isValidMarker,
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFiles,
  validateConfig,
} from "../src/config.js";

describe("config", () => {
  describe("validateConfig", () => {
    it("should accept a complete configuration", () => {
      expect(
        validateConfig(
          {
            marker: "HASH",
            hash: "fnv1a",
            extensions: ["c", ".h"],
            sourceMap: true,
            detectCollisions: "1",
            verbose: "false",
          },
          "test"
        )
      ).toEqual({
        marker: "HASH",
        hash: "fnv1a",
        extensions: [".c", ".h"],
        sourceMap: true,
        detectCollisions: true,
        verbose: false,
      });
    });

    it("should reject a marker with punctuation", () => {
      expect(() => validateConfig({ marker: "S_ID" }, "test")).toThrow(ConfigError);
    });

    it("should reject an unknown hash algorithm", () => {
      expect(() => validateConfig({ hash: "md5" }, "test")).toThrow(
        "test: unknown hash algorithm `md5`"
      );
    });

    it("should reject unknown keys", () => {
      expect(() => validateConfig({ markr: "SID" }, "test")).toThrow("unknown option `markr`");
    });

    it("should reject non-objects", () => {
      expect(() => validateConfig(["SID"], "test")).toThrow(ConfigError);
    });
  });

  describe("isValidMarker", () => {
    it("should accept letters and digits only", () => {
      expect(isValidMarker("SID2")).toBe(true);
      expect(isValidMarker("")).toBe(false);
      expect(isValidMarker("S_ID")).toBe(false);
    });
  });

  describe("loadConfigFromEnv", () => {
    it("should map STRID_* variables to options", () => {
      expect(
        loadConfigFromEnv({
          STRID_MARKER: "HASH",
          STRID_SOURCE_MAP: "1",
          STRID_DETECT_COLLISIONS: "true",
          STRID_EXTENSIONS: ".c, .h",
          STRID_NO_COLOR: "1",
          STRID_HOME: "/opt/strid",
          PATH: "/usr/bin",
        })
      ).toEqual({
        marker: "HASH",
        sourceMap: true,
        detectCollisions: true,
        extensions: [".c", ".h"],
      });
    });

    it("should ignore STRID_* variables that are not options", () => {
      expect(loadConfigFromEnv({ STRID_HOME: "/opt/strid", STRID_CACHE_DIR: "/tmp" })).toEqual({});
    });

    it("should reject a bad boolean", () => {
      expect(() => loadConfigFromEnv({ STRID_VERBOSE: "yes" })).toThrow(
        "environment: `verbose` must be a boolean"
      );
    });
  });

  describe("files", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "strid-config-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should find nothing in an empty directory", () => {
      expect(loadConfigFromFiles(dir)).toEqual({ config: {} });
    });

    it("should load .stridrc.json", () => {
      const file = path.join(dir, ".stridrc.json");
      fs.writeFileSync(file, JSON.stringify({ marker: "HASH", hash: "fnv1a" }));

      expect(loadConfigFromFiles(dir)).toEqual({
        config: { marker: "HASH", hash: "fnv1a" },
        filePath: file,
      });
    });

    it("should load the strid key of package.json", () => {
      fs.writeFileSync(
        path.join(dir, "package.json"),
        JSON.stringify({ name: "game", strid: { extensions: [".cpp"] } })
      );

      expect(loadConfigFromFiles(dir).config).toEqual({ extensions: [".cpp"] });
    });

    it("should surface invalid file contents", () => {
      fs.writeFileSync(path.join(dir, ".stridrc.json"), JSON.stringify({ hash: 5 }));

      expect(() => loadConfigFromFiles(dir)).toThrow(ConfigError);
    });

    it("should layer defaults, file, environment and overrides", () => {
      fs.writeFileSync(
        path.join(dir, ".stridrc.json"),
        JSON.stringify({ marker: "FILE", hash: "fnv1a", verbose: true })
      );

      const { config, filePath } = loadConfig({
        cwd: dir,
        env: { STRID_MARKER: "ENV", STRID_SOURCE_MAP: "1" },
        overrides: { marker: "FLAG" },
      });

      expect(filePath).toBe(path.join(dir, ".stridrc.json"));
      expect(config).toEqual({
        marker: "FLAG",
        hash: "fnv1a",
        extensions: DEFAULT_CONFIG.extensions,
        sourceMap: true,
        detectCollisions: false,
        verbose: true,
      });
    });

    it("should skip the file search on request", () => {
      fs.writeFileSync(path.join(dir, ".stridrc.json"), JSON.stringify({ marker: "FILE" }));

      const { config, filePath } = loadConfig({ cwd: dir, env: {}, noFile: true });

      expect(filePath).toBeUndefined();
      expect(config.marker).toBe("SID");
    });
  });
});
