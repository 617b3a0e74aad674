import * as path from "node:path";
import { LoadedConfig } from "../backend/configLoader";
import { resolveFixSettings } from "./parseOptions";

describe("resolveFixSettings", () => {
  const configDir = path.resolve("/projects/game");
  const loaded: LoadedConfig = {
    config: { bootShim: false, verifyOutput: true, trace: true, verbose: true, logFile: "logs/fix.log" },
    filePath: path.join(configDir, "cartfix.jsonc"),
    configDir,
  };

  it("should use defaults without config or flags", () => {
    expect(resolveFixSettings(undefined)).toEqual({
      bootShim: true,
      verifyOutput: false,
      trace: false,
      verbosity: "normal",
      logFile: null,
    });
  });

  it("should take values from the config file", () => {
    expect(resolveFixSettings(loaded, {})).toEqual({
      bootShim: false,
      verifyOutput: true,
      trace: true,
      verbosity: "verbose",
      logFile: path.join(configDir, "logs", "fix.log"),
    });
  });

  it("should let command line flags override the config file", () => {
    const settings = resolveFixSettings(loaded, {
      bootShim: true,
      verify: false,
      trace: false,
      quiet: true,
      logFile: "run.log",
    });

    expect(settings).toEqual({
      bootShim: true,
      verifyOutput: false,
      trace: false,
      verbosity: "quiet",
      logFile: path.resolve("run.log"),
    });
  });
});
