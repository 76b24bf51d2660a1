import { describe, expect, it, vi } from "vitest";
import {
  fakeSite,
  htmlResponse,
  listingPage,
  pdfResponse,
  recordingSleep,
  statusResponse,
} from "../../__tests__/helpers/fixtures";
import { DEFAULT_CONFIG } from "../../config";
import { MemoryLogWriter } from "../../observability";
import { InMemoryStorage } from "../../store";
import {
  applyCliOverrides,
  EXIT_INTERRUPTED,
  getHelpText,
  installInterruptCleanup,
  parseCliArgs,
  runCli,
} from "..";

const LISTING = "https://guias.test/listado";

function runtime(routes: Parameters<typeof fakeSite>[0]) {
  const site = fakeSite(routes);
  const writer = new MemoryLogWriter();
  const storage = new InMemoryStorage();
  return {
    site,
    writer,
    storage,
    options: {
      env: { LISTING_URL: LISTING },
      fetchFn: site.fetchFn,
      sleep: recordingSleep().sleep,
      writers: [writer],
      storage,
      manifests: false,
      onInterrupt: () => undefined,
    },
  };
}

describe("parseCliArgs", () => {
  it("runs the full pipeline when called without arguments", () => {
    expect(parseCliArgs([])).toEqual({
      command: "run",
      ignoreHttpsErrors: false,
      maxPages: undefined,
      outputDir: undefined,
      configPath: undefined,
    });
  });

  it("reads the command and options", () => {
    expect(
      parseCliArgs(["crawl", "--max-pages", "5", "--output-dir", "out", "--config", "c.json", "--ignore-https-errors"]),
    ).toEqual({
      command: "crawl",
      ignoreHttpsErrors: true,
      maxPages: 5,
      outputDir: "out",
      configPath: "c.json",
    });
    expect(parseCliArgs(["--output-dir", "out"])).toMatchObject({ command: "run", outputDir: "out" });
  });

  it("falls back to help for unknown commands and help flags", () => {
    expect(parseCliArgs(["fetch-everything"])).toBe("help");
    expect(parseCliArgs(["run", "--help"])).toBe("help");
    expect(parseCliArgs(["help"])).toBe("help");
  });
});

describe("applyCliOverrides", () => {
  it("prefers command-line values", () => {
    const config = applyCliOverrides(DEFAULT_CONFIG, {
      command: "run",
      ignoreHttpsErrors: false,
      maxPages: 7,
      outputDir: "elsewhere",
    });

    expect(config).toMatchObject({ maxPages: 7, outputDir: "elsewhere", ignoreHttpsErrors: false });
  });
});

describe("runCli", () => {
  it("prints help and exits cleanly", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await expect(runCli(["--help"])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(getHelpText());
  });

  it("exits 0 even when a document fails", async () => {
    const { options, storage, writer } = runtime({
      [LISTING]: htmlResponse(
        listingPage([
          { href: "/docs/A_GER.pdf", text: "A" },
          { href: "/docs/B_GER.pdf", text: "B" },
        ]),
      ),
      "https://guias.test/docs/A_GER.pdf": pdfResponse(),
      "https://guias.test/docs/B_GER.pdf": statusResponse(404),
    });

    await expect(runCli([], options)).resolves.toBe(0);
    expect([...storage.files.keys()]).toEqual(["A_GER.pdf"]);
    expect(writer.find("run_summary")[0].fields).toMatchObject({ downloaded: 1, failed: 1 });
  });

  it("exits 1 when the listing is unreachable", async () => {
    const { options, writer } = runtime({ [LISTING]: statusResponse(500) });

    await expect(runCli(["run"], options)).resolves.toBe(1);
    expect(writer.find("command_failed")[0]).toMatchObject({
      level: "error",
      fields: { code: "listing_unreachable" },
    });
  });

  it("exits 1 on invalid configuration", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { options } = runtime({});

    await expect(runCli(["run"], { ...options, env: { MAX_PAGES: "0" } })).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith("fatal: maxPages must be an integer >= 1 (got 0)");
  });
});

describe("installInterruptCleanup", () => {
  it("discards partial downloads and exits with 130 on SIGINT", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const storage = new InMemoryStorage();
    const discard = vi.spyOn(storage, "discardPending");
    const exit = vi.fn<(code: number) => void>();
    const listeners = () => [process.listenerCount("SIGINT"), process.listenerCount("SIGTERM")];
    const before = listeners();

    const handler = installInterruptCleanup(storage, exit);
    expect(listeners()).toEqual([before[0] + 1, before[1] + 1]);
    handler("SIGINT");

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(EXIT_INTERRUPTED));
    expect(discard).toHaveBeenCalledTimes(1);
    expect(listeners()).toEqual(before);
  });
});
