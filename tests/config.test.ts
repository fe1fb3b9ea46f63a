/**
 * Tests for smellscan configuration loading and validation.
 */

import * as path from "path";
import { loadConfig, loadConfigFromString, createDefaultConfig } from "../src/config/loader";
import { DEFAULT_DETECTOR_CONFIG } from "../src/analysis/rules";
import { ConfigError } from "../src/errors";

const FIXTURES_DIR = path.join(__dirname, "fixtures/smellscan-config");

describe("Config Loading", () => {
  describe("loadConfig", () => {
    it("should load config from .smellscan.yml file", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.raw.version).toBe(1);
      expect(config.raw.detectors?.LONG_METHOD).toEqual({ threshold: 80, high_above: 150 });
      expect(config.raw.detectors?.DEEP_NESTING?.enabled).toBe(false);
    });

    it("should return defaults when no config file exists", () => {
      const config = loadConfig("/nonexistent/path");

      expect(config.raw.version).toBe(1);
      expect(config.nesting.nested_definitions).toBe("accumulate");
      expect(config.getDetectorConfig("LONG_METHOD")).toEqual(DEFAULT_DETECTOR_CONFIG.LONG_METHOD);
    });

    it("should merge defaults with config file values", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.getDetectorConfig("LONG_METHOD")).toEqual({ enabled: true, threshold: 80, high_above: 150 });
      expect(config.getDetectorConfig("DEEP_NESTING")).toEqual({ enabled: false, threshold: 4, high_above: 5 });
      expect(config.getDetectorConfig("TOO_MANY_PARAMETERS")).toEqual(DEFAULT_DETECTOR_CONFIG.TOO_MANY_PARAMETERS);
      expect(config.nesting.nested_definitions).toBe("isolate");
    });
  });

  describe("createDefaultConfig", () => {
    it("should return default configuration", () => {
      const config = createDefaultConfig();

      expect(config.raw.version).toBe(1);
      expect(config.nesting.nested_definitions).toBe("accumulate");
      expect(config.isFileIgnored("anything.py")).toBe(false);
      expect(config.getDetectorConfig("DEEP_NESTING", "src/app.py")).toEqual(DEFAULT_DETECTOR_CONFIG.DEEP_NESTING);
    });

    it("should not share state with the defaults table", () => {
      const config = createDefaultConfig();
      const settings = config.getDetectorConfig("LONG_METHOD");
      settings.threshold = 1;

      expect(DEFAULT_DETECTOR_CONFIG.LONG_METHOD.threshold).toBe(50);
      expect(config.getDetectorConfig("LONG_METHOD").threshold).toBe(50);
    });
  });

  describe("loadConfigFromString", () => {
    it("should parse YAML config string", () => {
      const config = loadConfigFromString(`
version: 1
detectors:
  TOO_MANY_PARAMETERS:
    threshold: 3
    high_above: 4
`);

      expect(config.getDetectorConfig("TOO_MANY_PARAMETERS")).toEqual({ enabled: true, threshold: 3, high_above: 4 });
    });

    it("should treat an empty document as defaults", () => {
      const config = loadConfigFromString("");

      expect(config.raw.version).toBe(1);
      expect(config.getDetectorConfig("LONG_METHOD")).toEqual(DEFAULT_DETECTOR_CONFIG.LONG_METHOD);
    });
  });
});

describe("Config Validation", () => {
  it("should reject a negative threshold", () => {
    const load = () => loadConfigFromString("detectors:\n  LONG_METHOD:\n    threshold: -1\n");

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(".smellscan.yml: detectors.LONG_METHOD.threshold must be a non-negative integer (got -1)");
  });

  it("should reject a fractional ceiling", () => {
    expect(() => loadConfigFromString("detectors:\n  DEEP_NESTING:\n    high_above: 2.5\n")).toThrow(
      "detectors.DEEP_NESTING.high_above must be a non-negative integer (got 2.5)"
    );
  });

  it("should reject unknown smell types", () => {
    expect(() => loadConfigFromString("detectors:\n  GOD_CLASS:\n    threshold: 1\n")).toThrow(
      'detectors: unknown smell type "GOD_CLASS"'
    );
  });

  it("should reject unknown detector settings", () => {
    expect(() => loadConfigFromString("detectors:\n  LONG_METHOD:\n    level: error\n")).toThrow(
      'detectors.LONG_METHOD: unknown setting "level"'
    );
  });

  it("should reject a non-boolean enabled flag", () => {
    expect(() => loadConfigFromString('detectors:\n  LONG_METHOD:\n    enabled: "yes"\n')).toThrow(
      "detectors.LONG_METHOD.enabled must be true or false"
    );
  });

  it("should reject an unsupported version", () => {
    expect(() => loadConfigFromString("version: 2\n")).toThrow("unsupported version 2 (expected 1)");
  });

  it("should reject an unknown nesting mode", () => {
    expect(() => loadConfigFromString("nesting:\n  nested_definitions: sometimes\n")).toThrow(
      'nesting.nested_definitions must be one of accumulate, isolate (got "sometimes")'
    );
  });

  it("should reject malformed YAML", () => {
    expect(() => loadConfigFromString("detectors: [unclosed\n")).toThrow(ConfigError);
    expect(() => loadConfigFromString("detectors: [unclosed\n")).toThrow(".smellscan.yml: invalid YAML");
  });

  it("should reject a non-mapping document", () => {
    expect(() => loadConfigFromString("- just\n- a list\n")).toThrow("top level must be a mapping");
  });

  it("should reject invalid override entries", () => {
    expect(() =>
      loadConfigFromString("overrides:\n  - patterns: [1]\n    detectors: {}\n")
    ).toThrow("overrides[0].patterns must only contain strings (got 1)");
  });

  it("should name the config file in errors from loadConfig", () => {
    expect(() => loadConfigFromString("version: 3\n", "/repo/.smellscan.yml")).toThrow(
      "/repo/.smellscan.yml: unsupported version 3"
    );
  });
});

describe("File Filtering", () => {
  describe("isFileIgnored", () => {
    it("should match ignore patterns", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.isFileIgnored("tests/test_app.py")).toBe(true);
      expect(config.isFileIgnored("app/models_pb2.py")).toBe(true);
      expect(config.isFileIgnored("app/main.py")).toBe(false);
    });

    it("should normalize Windows separators", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.isFileIgnored("tests\\unit\\test_app.py")).toBe(true);
    });
  });
});

describe("Path Overrides", () => {
  it("should apply overrides to matching paths only", () => {
    const config = loadConfig(FIXTURES_DIR);

    expect(config.getDetectorConfig("LONG_METHOD", "scripts/run.py")).toEqual({
      enabled: true,
      threshold: 200,
      high_above: 150,
    });
    expect(config.getDetectorConfig("LONG_METHOD", "app/run.py").threshold).toBe(80);
  });

  it("should apply later overrides over earlier ones", () => {
    const config = loadConfigFromString(`
overrides:
  - patterns: ["src/**"]
    detectors:
      TOO_MANY_PARAMETERS: { threshold: 8 }
  - patterns: ["src/api/**"]
    detectors:
      TOO_MANY_PARAMETERS: { threshold: 10, enabled: false }
`);

    expect(config.getDetectorConfig("TOO_MANY_PARAMETERS", "src/core/a.py")).toEqual({
      enabled: true,
      threshold: 8,
      high_above: 7,
    });
    expect(config.getDetectorConfig("TOO_MANY_PARAMETERS", "src/api/b.py")).toEqual({
      enabled: false,
      threshold: 10,
      high_above: 7,
    });
  });
});
