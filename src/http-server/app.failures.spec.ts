/**
 * @file Specs: filesystem failures surfacing through the Hono app
 */
import { mkdtemp, open, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { createApp } from "./app";
import type { ServerConfig } from "./types";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, stat: vi.fn(actual.stat), open: vi.fn(actual.open) };
});

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated failure`), { code });
}

describe("http-server/app filesystem failures", () => {
  const dirs = { root: "" };

  function configFor(): ServerConfig {
    return {
      root: dirs.root,
      port: 0,
      host: "127.0.0.1",
      listDirectories: true,
      indexFiles: ["index.html"],
      logRequests: false,
    };
  }

  beforeAll(async () => {
    dirs.root = await mkdtemp(path.join(tmpdir(), "css-fail-"));
    await writeFile(path.join(dirs.root, "x.txt"), "payload");
  });

  afterAll(async () => {
    await rm(dirs.root, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers 500 with the bare status text when stat fails unexpectedly", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const io = errnoError("EIO");
    vi.mocked(stat).mockRejectedValueOnce(io);

    const res = await createApp(configFor()).request("/x.txt");
    expect(res.status).toBe(500);
    expect(await res.text()).toBe("Internal Server Error");
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(res.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
    expect(res.headers.get("access-control-allow-headers")).toBe("Content-Type");
    expect(errorLog).toHaveBeenCalledTimes(1);
    expect(errorLog).toHaveBeenCalledWith(`Cannot stat ${path.join(dirs.root, "x.txt")} (GET /x.txt):`, io);
  });

  it("answers 500 when a file that exists cannot be opened", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const io = errnoError("EMFILE");
    vi.mocked(open).mockRejectedValueOnce(io);

    const res = await createApp(configFor()).request("/x.txt");
    expect(res.status).toBe(500);
    expect(await res.text()).toBe("Internal Server Error");
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(errorLog).toHaveBeenCalledWith(`Cannot open ${path.join(dirs.root, "x.txt")} (GET /x.txt):`, io);
  });

  it("answers 404 without logging when the file is unreadable", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.mocked(open).mockRejectedValueOnce(errnoError("EACCES"));

    const res = await createApp(configFor()).request("/x.txt");
    expect(res.status).toBe(404);
    expect(await res.text()).toBe("Not Found");
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(errorLog).not.toHaveBeenCalled();
  });

  it("keeps serving once a failure has passed", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.mocked(stat).mockRejectedValueOnce(errnoError("EIO"));
    const app = createApp(configFor());

    expect((await app.request("/x.txt")).status).toBe(500);
    const res = await app.request("/x.txt");
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("payload");
  });
});
