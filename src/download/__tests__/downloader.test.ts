import { describe, expect, it } from "vitest";
import {
  fakeSite,
  htmlResponse,
  pdfResponse,
  PDF_BYTES,
  recordingSleep,
  statusResponse,
  testConfig,
  testLogger,
} from "../../__tests__/helpers/fixtures";
import { classifyLink } from "../../classify";
import type { FetchFn } from "../../core/fetch";
import { PageFetcher } from "../../core/pageFetcher";
import { RequestThrottle } from "../../core/throttle";
import { InMemoryStorage } from "../../store";
import type { DocumentDescriptor } from "../../types";
import { downloadOne, hasPdfSignature } from "../downloader";

const DOC_URL = "https://guias.test/docs/IMSS-050-18_050GER.pdf";
const FILE_NAME = "IMSS-050-18_IMSS-050-18_050GER.pdf";

function descriptorFor(url: string): DocumentDescriptor {
  const classified = classifyLink(url, "Guía");
  if (classified.kind !== "include") {
    throw new Error(`expected ${url} to be included`);
  }
  return classified.descriptor;
}

function setup(fetchFn: FetchFn) {
  const config = testConfig();
  const { logger, writer } = testLogger();
  const storage = new InMemoryStorage();
  const { sleep } = recordingSleep();
  const deps = {
    config,
    logger,
    storage,
    fetcher: new PageFetcher({ config, logger, fetchFn, sleep }),
    throttle: new RequestThrottle({ minDelayMs: 0, sleep }),
  };
  return { deps, storage, writer };
}

describe("downloadOne", () => {
  it("writes a valid PDF under its deterministic file name", async () => {
    const { fetchFn } = fakeSite({ [DOC_URL]: pdfResponse() });
    const { deps, storage, writer } = setup(fetchFn);

    const outcome = await downloadOne(deps, descriptorFor(DOC_URL));

    expect(outcome).toEqual({
      status: "downloaded",
      fileName: FILE_NAME,
      filePath: `memory://${FILE_NAME}`,
      bytes: PDF_BYTES.length,
    });
    expect(storage.files.get(FILE_NAME)).toEqual(PDF_BYTES);
    expect(writer.find("download_item_ok")).toHaveLength(1);
  });

  it("skips an existing file without touching the network", async () => {
    const { fetchFn } = fakeSite({ [DOC_URL]: pdfResponse() });
    const { deps, storage } = setup(fetchFn);
    storage.files.set(FILE_NAME, Buffer.from("%PDF-old"));

    const outcome = await downloadOne(deps, descriptorFor(DOC_URL));

    expect(outcome).toEqual({
      status: "skipped_duplicate",
      fileName: FILE_NAME,
      filePath: `memory://${FILE_NAME}`,
    });
    expect(fetchFn).not.toHaveBeenCalled();
    expect(storage.files.get(FILE_NAME)?.toString("ascii")).toBe("%PDF-old");
  });

  it("refuses a 200 response that is not a PDF", async () => {
    const { fetchFn } = fakeSite({ [DOC_URL]: htmlResponse("<html>Página no encontrada</html>") });
    const { deps, storage } = setup(fetchFn);

    const outcome = await downloadOne(deps, descriptorFor(DOC_URL));

    expect(outcome).toMatchObject({ status: "failed", reason: "invalid_content" });
    expect(storage.files.size).toBe(0);
  });

  it("reports HTTP failures after the fetcher gives up", async () => {
    const { fetchFn } = fakeSite({ [DOC_URL]: statusResponse(404) });
    const { deps, storage, writer } = setup(fetchFn);

    const outcome = await downloadOne(deps, descriptorFor(DOC_URL));

    expect(outcome).toEqual({
      status: "failed",
      fileName: FILE_NAME,
      reason: "http",
      message: "HTTP 404",
    });
    expect(storage.files.size).toBe(0);
    expect(writer.find("download_item_failed")[0].level).toBe("error");
  });

  it("reports network failures", async () => {
    const { fetchFn } = fakeSite({ [DOC_URL]: new Error("ETIMEDOUT") });
    const { deps } = setup(fetchFn);

    const outcome = await downloadOne(deps, descriptorFor(DOC_URL));

    expect(outcome).toMatchObject({ status: "failed", reason: "network", message: "ETIMEDOUT" });
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("turns a storage error into a failed outcome", async () => {
    const { fetchFn } = fakeSite({ [DOC_URL]: pdfResponse() });
    const { deps, storage } = setup(fetchFn);
    storage.failWrites = new Error("ENOSPC: no space left on device");

    const outcome = await downloadOne(deps, descriptorFor(DOC_URL));

    expect(outcome).toEqual({
      status: "failed",
      fileName: FILE_NAME,
      reason: "write_error",
      message: "ENOSPC: no space left on device",
    });
  });
});

describe("hasPdfSignature", () => {
  it("checks the leading bytes only", () => {
    expect(hasPdfSignature(Buffer.from("%PDF-1.7 ..."))).toBe(true);
    expect(hasPdfSignature(Buffer.from("%PDF"))).toBe(false);
    expect(hasPdfSignature(Buffer.from(" %PDF-1.7"))).toBe(false);
    expect(hasPdfSignature(new Uint8Array())).toBe(false);
  });
});
