import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { runExtract } from "../src/commands/extract";

const fixturesDir = path.join(process.cwd(), "fixtures");

afterEach(() => {
  vi.restoreAllMocks();
});

describe("extract command", () => {
  it("prints the programs field for a saved page", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runExtract({
      htmlPath: path.join(fixturesDir, "programs_accordion.html"),
      label: "Programs Offered",
      json: false
    });

    expect(log).toHaveBeenCalledWith("Business (Item1, Item2); Technology (Item3, Item4)");
  });

  it("prints the structure as JSON", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runExtract({
      htmlPath: path.join(fixturesDir, "programs_accordion.html"),
      label: "Programs Offered",
      json: true
    });

    const printed: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(printed).toMatchObject({
      kind: "structured",
      categories: { Business: ["Item1", "Item2"], Technology: ["Item3", "Item4"] },
      programs: "Business (Item1, Item2); Technology (Item3, Item4)"
    });
  });
});
