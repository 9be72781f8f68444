// Shared Vitest setup: every test starts from default configuration and an
// empty debug summary, with console mirroring off regardless of the
// LICENSE_RDF_DEBUG environment of the machine running the suite.
import { beforeEach } from "vitest";
import { mapperConfigStore } from "./stores/mapperConfigStore";
import { resetSummary } from "./utils/debugLog";

beforeEach(() => {
  mapperConfigStore.getState().resetToDefaults();
  mapperConfigStore.getState().setDebugLogging(false);
  resetSummary();
});
