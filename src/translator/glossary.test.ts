import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as logger from "../utils/logger.js";
import { SetupError } from "./errors.js";
import { loadGlossary, renderGlossary } from "./glossary.js";

describe("renderGlossary", () => {
  it("renders one line per entry", () => {
    expect(
      renderGlossary([
        { term: "entropy", translation: "엔트로피" },
        { term: "prior", translation: "사전 분포" },
      ])
    ).toBe("- entropy > 엔트로피\n- prior > 사전 분포");
  });

  it("renders nothing for no entries", () => {
    expect(renderGlossary([])).toBe("");
  });
});

describe("loadGlossary", () => {
  let dir: string;

  beforeEach(async () => {
    logger.configureLogger({ logToConsole: false });
    dir = await mkdtemp(join(tmpdir(), "glossary-"));
  });

  afterEach(async () => {
    logger.resetLogger();
    await rm(dir, { recursive: true, force: true });
  });

  it("returns an empty glossary when no file is configured", async () => {
    expect(await loadGlossary()).toBe("");
  });

  it("loads and renders a glossary file", async () => {
    const path = join(dir, "glossary.json");
    await writeFile(
      path,
      JSON.stringify([{ term: "transformer", translation: "트랜스포머" }]),
      "utf-8"
    );
    expect(await loadGlossary(path)).toBe("- transformer > 트랜스포머");
  });

  it("rejects entries with the wrong shape", async () => {
    const path = join(dir, "glossary.json");
    await writeFile(path, JSON.stringify([{ term: "", meaning: "x" }]), "utf-8");
    await expect(loadGlossary(path)).rejects.toThrow(SetupError);
  });

  it("rejects a file that is not JSON", async () => {
    const path = join(dir, "glossary.json");
    await writeFile(path, "term > translation", "utf-8");
    await expect(loadGlossary(path)).rejects.toThrow(
      `Glossary file could not be read: ${path}`
    );
  });

  it("rejects a missing file", async () => {
    await expect(loadGlossary(join(dir, "missing.json"))).rejects.toThrow(SetupError);
  });
});
