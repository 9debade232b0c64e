// test/AppError.spec.ts
import { describe, it, expect } from "vitest";
import { AppError } from "../src/errors/AppError";

describe("AppError kinds", () => {
  it.each([
    [AppError.internal(new Error("db down")), "internal", 500, "an unspecified internal error occurred: db down"],
    [AppError.other(new Error("db down")), "other", 500, "db down"],
    [AppError.anyhow(new Error("db down")), "anyhow", 400, "an error has occurred: db down"],
    [AppError.headerParse(new Error("bad byte")), "headerParse", 400, "unable to parse headers: bad byte"],
    [AppError.assetNotFound("app.js"), "assetNotFound", 500, "Failed to find app.js"],
  ])("%#: maps %s", (err, kind, status, message) => {
    expect(err.kind).toBe(kind);
    expect(err.statusCode).toBe(status);
    expect(err.message).toBe(message);
    expect(err).toBeInstanceOf(Error);
  });
});

describe("AppError.from", () => {
  it("returns an AppError unchanged", () => {
    const original = AppError.internal("x");
    expect(AppError.from(original)).toBe(original);
  });

  it("wraps plain errors as anyhow", () => {
    const cause = new Error("ENOENT: no such file");
    const err = AppError.from(cause);
    expect(err.kind).toBe("anyhow");
    expect(err.statusCode).toBe(400);
    expect(err.message).toBe("an error has occurred: ENOENT: no such file");
    expect(err.cause).toBe(cause);
  });

  it("keeps only the canonical reason of a response-like value", () => {
    expect(AppError.from({ status: 404, body: "secret" }).message).toBe(
      "an error has occurred: HTTP response error: Not Found"
    );
    expect(AppError.from({ status: 799 }).message).toBe(
      "an error has occurred: HTTP response error: "
    );
  });

  it("stringifies anything else", () => {
    expect(AppError.from("plain failure").message).toBe(
      "an error has occurred: plain failure"
    );
  });
});

describe("toResponseBody", () => {
  it("omits the stack trace unless asked", () => {
    const err = AppError.internal(new Error("kaput"));
    expect(err.toResponseBody(false)).toEqual({
      message: "an unspecified internal error occurred: kaput",
      status: 500,
    });
  });

  it("includes the cause's stack trace when asked", () => {
    const cause = new Error("kaput");
    const body = AppError.anyhow(cause).toResponseBody(true);
    expect(body.message).toBe("an error has occurred: kaput");
    expect(body.status).toBe(400);
    expect(body.stacktrace).toBe(cause.stack);
  });

  it("falls back to its own stack when there is no cause", () => {
    const body = AppError.assetNotFound("logo.svg").toResponseBody(true);
    expect(body.stacktrace).toContain("Failed to find logo.svg");
  });
});
