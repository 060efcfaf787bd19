import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { loadAppConfig } from "../shared/config/env";
import { silentLogger } from "../__tests__/support/fakes";
import { buildCli, startupWorkflow } from "./main";

const packageScripts = z
  .object({ scripts: z.record(z.string()) })
  .parse(
    JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf8"),
    ),
  ).scripts;

describe("buildCli", () => {
  const cli = buildCli(loadAppConfig({ NODE_ENV: "test" }), silentLogger);
  const commandNames = cli.commands.map((command) => command.name());

  it("registers the operator commands", () => {
    expect(commandNames).toEqual([
      "migrate",
      "sync-stocks",
      "stocks",
      "remove-stock",
      "ingest-history",
      "enqueue-history",
      "history",
      "latest",
      "date-range",
      "variation",
      "discover-news",
      "collect-news",
      "enrich-news",
      "news",
      "status",
    ]);
  });

  it("describes a startup workflow made of this package's scripts and commands", () => {
    for (const step of startupWorkflow) {
      const [, script, command] =
        /^npm run (\S+)(?: -- (\S+))?/.exec(step) ?? [];
      expect(script && packageScripts[script]).toBeTruthy();
      if (command !== undefined) {
        expect(commandNames).toContain(command);
      }
    }
  });
});
