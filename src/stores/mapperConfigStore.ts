/**
 * @fileoverview Mapper Configuration Store
 * Holds runtime settings for logging, HTML conversion and the target graph.
 * Vanilla zustand store: no React, readable from any module via getState().
 */

import { createStore } from "zustand/vanilla";
import { LicenseValidationError } from "../utils/errors";
import { isPlainObject } from "../utils/guards";
import {
  normalizeBooleanFlag,
  normalizeCount,
  normalizeGraphName,
  normalizeWordwrap,
} from "../utils/normalizers";

export interface MapperConfig {
  // Debug / developer toggles
  // When true the debug log mirrors every recorded entry to the console.
  debugLogging: boolean;
  // Upper bound on entries kept in the in-memory debug summary.
  maxLogEntries: number;

  // HTML-to-text conversion of license bodies and templates
  htmlWordwrap: number | false;
  htmlPreserveNewlines: boolean;

  // Named graph N3TripleStore reads and writes; null means the default graph.
  graphName: string | null;
}

interface MapperConfigStore {
  config: MapperConfig;

  setDebugLogging: (enabled: boolean) => void;
  setMaxLogEntries: (max: number) => void;
  setHtmlOptions: (options: { wordwrap?: number | false; preserveNewlines?: boolean }) => void;
  setGraphName: (graphName: string | null) => void;

  // Utility actions
  resetToDefaults: () => void;
  exportConfig: () => string;
  importConfig: (configJson: string) => void;
}

function envDebugEnabled(): boolean {
  const raw = process.env.LICENSE_RDF_DEBUG;
  return raw === "1" || raw === "true";
}

export function defaultMapperConfig(): MapperConfig {
  return {
    debugLogging: envDebugEnabled(),
    maxLogEntries: 10000,
    htmlWordwrap: false,
    htmlPreserveNewlines: true,
    graphName: null,
  };
}

function parseConfig(raw: unknown, base: MapperConfig): MapperConfig {
  if (!isPlainObject(raw)) {
    throw new LicenseValidationError("config must be a JSON object", { received: raw });
  }
  return {
    debugLogging: normalizeBooleanFlag(raw.debugLogging, "config.debugLogging", base.debugLogging),
    maxLogEntries:
      raw.maxLogEntries === undefined
        ? base.maxLogEntries
        : normalizeCount(raw.maxLogEntries, "config.maxLogEntries"),
    htmlWordwrap:
      raw.htmlWordwrap === undefined
        ? base.htmlWordwrap
        : normalizeWordwrap(raw.htmlWordwrap, "config.htmlWordwrap"),
    htmlPreserveNewlines: normalizeBooleanFlag(
      raw.htmlPreserveNewlines,
      "config.htmlPreserveNewlines",
      base.htmlPreserveNewlines,
    ),
    graphName:
      raw.graphName === undefined
        ? base.graphName
        : normalizeGraphName(raw.graphName, "config.graphName"),
  };
}

export const mapperConfigStore = createStore<MapperConfigStore>()((set, get) => ({
  config: defaultMapperConfig(),

  setDebugLogging: (enabled) => {
    set((state) => ({ config: { ...state.config, debugLogging: enabled } }));
  },

  setMaxLogEntries: (max) => {
    const bounded = normalizeCount(max, "maxLogEntries");
    set((state) => ({ config: { ...state.config, maxLogEntries: bounded } }));
  },

  setHtmlOptions: (options) => {
    set((state) => ({
      config: {
        ...state.config,
        htmlWordwrap:
          options.wordwrap === undefined
            ? state.config.htmlWordwrap
            : normalizeWordwrap(options.wordwrap, "htmlWordwrap"),
        htmlPreserveNewlines: normalizeBooleanFlag(
          options.preserveNewlines,
          "htmlPreserveNewlines",
          state.config.htmlPreserveNewlines,
        ),
      },
    }));
  },

  setGraphName: (graphName) => {
    const normalized = normalizeGraphName(graphName, "graphName");
    set((state) => ({ config: { ...state.config, graphName: normalized } }));
  },

  resetToDefaults: () => {
    set({ config: defaultMapperConfig() });
  },

  exportConfig: () => {
    return JSON.stringify(get().config, null, 2);
  },

  importConfig: (configJson) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(configJson);
    } catch (err) {
      throw new LicenseValidationError("Invalid config format", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    set({ config: parseConfig(parsed, get().config) });
  },
}));

export function getMapperConfig(): MapperConfig {
  return mapperConfigStore.getState().config;
}
