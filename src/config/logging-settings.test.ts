import { afterEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import {
  configureLogging,
  getLoggingSettings,
  loadLoggingSettingsFromEnv,
  resetLoggingSettings,
} from "./logging-settings.js";

afterEach(() => {
  resetLoggingSettings();
});

describe("process logging settings", () => {
  it("starts from the defaults", () => {
    expect(getLoggingSettings()).toEqual({ suppressLogging: false, bigCacheLimit: 256 });
  });

  it("applies overrides cumulatively", () => {
    configureLogging({ suppressLogging: true });
    const settings = configureLogging({ bigCacheLimit: 10 });
    expect(settings).toEqual({ suppressLogging: true, bigCacheLimit: 10 });
    expect(getLoggingSettings()).toBe(settings);
  });

  it("hands out frozen snapshots", () => {
    expect(Object.isFrozen(configureLogging({ bigCacheLimit: 3 }))).toBe(true);
  });

  it("keeps the previous settings when validation fails", () => {
    configureLogging({ bigCacheLimit: 12 });
    expect(() => configureLogging({ bigCacheLimit: -1 })).toThrow(ConfigurationError);
    expect(getLoggingSettings().bigCacheLimit).toBe(12);
  });

  it("reset restores the defaults", () => {
    configureLogging({ suppressLogging: true });
    resetLoggingSettings();
    expect(getLoggingSettings().suppressLogging).toBe(false);
  });
});

describe("loadLoggingSettingsFromEnv", () => {
  it("reads both variables", () => {
    expect(loadLoggingSettingsFromEnv({ LOGHOST_SUPPRESS: "TRUE", LOGHOST_CACHE_LIMIT: "64" })).toEqual({
      suppressLogging: true,
      bigCacheLimit: 64,
    });
  });

  it("accepts the usual spellings of off", () => {
    for (const value of ["0", "false", "no", "off", " Off "]) {
      expect(loadLoggingSettingsFromEnv({ LOGHOST_SUPPRESS: value })).toEqual({
        suppressLogging: false,
      });
    }
  });

  it("ignores unset and empty variables", () => {
    expect(loadLoggingSettingsFromEnv({})).toEqual({});
    expect(loadLoggingSettingsFromEnv({ LOGHOST_SUPPRESS: "", LOGHOST_CACHE_LIMIT: " " })).toEqual({});
  });

  it("ignores unrelated variables", () => {
    expect(loadLoggingSettingsFromEnv({ PATH: "/usr/bin" })).toEqual({});
  });

  it("rejects unrecognized flag values", () => {
    expect(() => loadLoggingSettingsFromEnv({ LOGHOST_SUPPRESS: "maybe" })).toThrow(
      "Invalid logging environment",
    );
  });

  it("rejects non-numeric and non-positive cache limits", () => {
    expect(() => loadLoggingSettingsFromEnv({ LOGHOST_CACHE_LIMIT: "abc" })).toThrow(
      ConfigurationError,
    );
    expect(() => loadLoggingSettingsFromEnv({ LOGHOST_CACHE_LIMIT: "0" })).toThrow(
      ConfigurationError,
    );
  });

  it("feeds configureLogging", () => {
    configureLogging(loadLoggingSettingsFromEnv({ LOGHOST_CACHE_LIMIT: "5" }));
    expect(getLoggingSettings().bigCacheLimit).toBe(5);
  });
});
