/**
 * @file Specs: config normalization
 */
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ConfigError } from "./errors";
import { DEFAULT_INDEX_FILES, normalizeConfig, parsePort, validateRawConfig } from "./normalize";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(tmpdir(), "css-config-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("config/normalize", () => {
  it("parses ports from numbers and digit strings", () => {
    expect(parsePort(0)).toBe(0);
    expect(parsePort(3000)).toBe(3000);
    expect(parsePort(" 8080 ")).toBe(8080);
    expect(parsePort("65535")).toBe(65535);
    expect(parsePort("65536")).toBeNull();
    expect(parsePort(-1)).toBeNull();
    expect(parsePort(80.5)).toBeNull();
    expect(parsePort("80abc")).toBeNull();
    expect(parsePort("")).toBeNull();
  });

  it("collects every structural problem", () => {
    expect(validateRawConfig({})).toEqual([]);
    expect(validateRawConfig({ port: "x", host: " ", root: "", indexFiles: ["a/b.html"] })).toEqual([
      'port: must be an integer between 0 and 65535 (got "x")',
      "host: must be a non-empty string",
      "root: must be a non-empty path",
      "indexFiles: must be plain file names",
    ]);
  });

  it("fills defaults and resolves root against the base directory", async () =>
    withTempDir(async (dir) => {
      const cfg = await normalizeConfig({}, dir);
      expect(cfg).toEqual({
        root: path.resolve(dir),
        port: 3000,
        host: "0.0.0.0",
        listDirectories: true,
        indexFiles: [...DEFAULT_INDEX_FILES],
        logRequests: true,
      });
    }));

  it("accepts explicit values", async () =>
    withTempDir(async (dir) => {
      const cfg = await normalizeConfig(
        { root: dir, port: "0", host: "127.0.0.1", listDirectories: false, logRequests: false, indexFiles: ["home.html"] },
        "/",
      );
      expect(cfg.root).toBe(path.resolve(dir));
      expect(cfg.port).toBe(0);
      expect(cfg.host).toBe("127.0.0.1");
      expect(cfg.listDirectories).toBe(false);
      expect(cfg.logRequests).toBe(false);
      expect(cfg.indexFiles).toEqual(["home.html"]);
    }));

  it("rejects a missing root and a root that is a file", async () =>
    withTempDir(async (dir) => {
      const missing = path.join(dir, "nope");
      await expect(normalizeConfig({ root: missing })).rejects.toThrow(`root: directory does not exist: ${missing}`);
      const file = path.join(dir, "file.txt");
      await writeFile(file, "x");
      await expect(normalizeConfig({ root: file })).rejects.toThrow(`root: not a directory: ${file}`);
    }));

  it("throws a ConfigError carrying the problem list", async () =>
    withTempDir(async (dir) => {
      const err = await normalizeConfig({ port: 70000 }, dir).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.problems).toEqual(["port: must be an integer between 0 and 65535 (got 70000)"]);
        expect(err.message).toBe("Invalid configuration:\n- port: must be an integer between 0 and 65535 (got 70000)");
      }
    }));
});
