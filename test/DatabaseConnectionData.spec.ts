// test/DatabaseConnectionData.spec.ts
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

const { getMock } = vi.hoisted(() => ({ getMock: vi.fn() }));
vi.mock("axios", () => ({ default: { get: getMock } }));

import {
  EMPTY_CONNECTION_DATA,
  fetchDatabaseConnectionData,
} from "../src/db/DatabaseConnectionData";

const credentials = {
  host: "db.internal",
  user: "app",
  password: "test-secret",
  filemaker: { username: "fm-user", password: "test-secret" },
  hash: "test-hash",
};

describe("fetchDatabaseConnectionData (production)", () => {
  const savedUrl = process.env.DB_CONFIG_URL;

  beforeEach(() => {
    getMock.mockReset();
    delete process.env.DB_CONFIG_URL;
  });

  afterEach(() => {
    if (savedUrl === undefined) delete process.env.DB_CONFIG_URL;
    else process.env.DB_CONFIG_URL = savedUrl;
  });

  it("GETs the remote endpoint and validates the payload", async () => {
    getMock.mockResolvedValueOnce({ status: 200, data: credentials });

    const data = await fetchDatabaseConnectionData({
      mode: "production",
      url: "https://config.test/config.json",
    });

    expect(data).toEqual(credentials);
    expect(getMock).toHaveBeenCalledTimes(1);
    expect(getMock).toHaveBeenCalledWith(
      "https://config.test/config.json",
      expect.objectContaining({ timeout: 10_000, httpsAgent: undefined })
    );
  });

  it("uses DB_CONFIG_URL when no url is passed", async () => {
    process.env.DB_CONFIG_URL = "https://env.test/config.json";
    getMock.mockResolvedValueOnce({ status: 200, data: credentials });

    await fetchDatabaseConnectionData({ mode: "production" });
    expect(getMock.mock.calls[0]?.[0]).toBe("https://env.test/config.json");
  });

  it("passes a lenient TLS agent when asked", async () => {
    getMock.mockResolvedValueOnce({ status: 200, data: credentials });

    await fetchDatabaseConnectionData({
      mode: "production",
      url: "https://config.test/config.json",
      insecureTls: true,
    });
    const opts = getMock.mock.calls[0]?.[1];
    expect(opts.httpsAgent.options.rejectUnauthorized).toBe(false);
  });

  it("fails without an endpoint", async () => {
    await expect(
      fetchDatabaseConnectionData({ mode: "production" })
    ).rejects.toThrow(/^DB_CONFIG_URL_MISSING:/);
    expect(getMock).not.toHaveBeenCalled();
  });

  it("rejects a payload missing the filemaker credentials", async () => {
    const { filemaker: _omit, ...partial } = credentials;
    getMock.mockResolvedValueOnce({ status: 200, data: partial });

    await expect(
      fetchDatabaseConnectionData({
        mode: "production",
        url: "https://config.test/config.json",
      })
    ).rejects.toThrow(/filemaker/);
  });

  it("propagates transport failures", async () => {
    const down = new Error("getaddrinfo ENOTFOUND config.test");
    getMock.mockRejectedValueOnce(down);

    await expect(
      fetchDatabaseConnectionData({
        mode: "production",
        url: "https://config.test/config.json",
      })
    ).rejects.toBe(down);
  });
});

describe("fetchDatabaseConnectionData (development)", () => {
  let dir: string;

  beforeEach(async () => {
    getMock.mockReset();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "db-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads the local file without touching the network", async () => {
    const file = path.join(dir, "dev-server.json");
    await fs.writeFile(file, JSON.stringify(credentials), "utf8");

    await expect(
      fetchDatabaseConnectionData({ mode: "development", file })
    ).resolves.toEqual(credentials);
    expect(getMock).not.toHaveBeenCalled();
  });

  it("creates a blank file and fails once when it is missing", async () => {
    const file = path.join(dir, "nested", "dev-server.json");

    await expect(
      fetchDatabaseConnectionData({ mode: "development", file })
    ).rejects.toThrow(/^DB_CONFIG_CREATED:/);

    const written: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    expect(written).toEqual(EMPTY_CONNECTION_DATA);

    await expect(
      fetchDatabaseConnectionData({ mode: "development", file })
    ).resolves.toEqual({
      host: "",
      user: "",
      password: "",
      filemaker: { username: "", password: "" },
      hash: "",
    });
  });

  it("rejects a file with the wrong shape", async () => {
    const file = path.join(dir, "dev-server.json");
    await fs.writeFile(file, JSON.stringify({ host: "db.internal" }), "utf8");

    await expect(
      fetchDatabaseConnectionData({ mode: "development", file })
    ).rejects.toThrow(/user/);
  });

  it("rejects a file that is not JSON", async () => {
    const file = path.join(dir, "dev-server.json");
    await fs.writeFile(file, "host=db.internal", "utf8");

    await expect(
      fetchDatabaseConnectionData({ mode: "development", file })
    ).rejects.toThrow(SyntaxError);
  });
});
