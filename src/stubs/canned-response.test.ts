import { describe, it, expect } from "vitest";
import { CannedResponse } from "./canned-response.js";
import { StubClientError } from "../domain/errors.js";

describe("CannedResponse", () => {
  it("exposes code, headers and body", () => {
    const res = new CannedResponse(201, { location: "/items/7" }, "created");
    expect(res.code).toBe(201);
    expect(res.headers).toEqual({ location: "/items/7" });
    expect(Buffer.from(res.body ?? new Uint8Array()).toString("utf-8")).toBe("created");
  });

  it("leaves body undefined when none is given", () => {
    expect(new CannedResponse(204, {}).body).toBeUndefined();
  });

  it("is equal to itself", () => {
    const res = new CannedResponse(200, { "x-id": ["a", "b"] }, "ok");
    expect(res.equals(res)).toBe(true);
  });

  it("is equal when code, headers and body are equal", () => {
    const a = new CannedResponse(200, { "content-type": "text/plain" }, "ok");
    const b = new CannedResponse(200, { "content-type": "text/plain" }, new Uint8Array([111, 107]));
    expect(a.equals(b)).toBe(true);
    expect(b.equals(a)).toBe(true);
  });

  it("differs when any field differs", () => {
    const base = new CannedResponse(200, { a: "1" }, "ok");
    expect(base.equals(new CannedResponse(404, { a: "1" }, "ok"))).toBe(false);
    expect(base.equals(new CannedResponse(200, { a: "2" }, "ok"))).toBe(false);
    expect(base.equals(new CannedResponse(200, { a: "1" }, "nope"))).toBe(false);
    expect(base.equals(new CannedResponse(200, { a: "1" }))).toBe(false);
  });

  it("is never equal to a non-CannedResponse", () => {
    const res = new CannedResponse(200, {}, "ok");
    expect(res.equals({ code: 200, headers: {}, body: res.body })).toBe(false);
    expect(res.equals(null)).toBe(false);
  });

  it("does not change when the headers object passed in is mutated", () => {
    const headers: Record<string, string> = { a: "1" };
    const res = new CannedResponse(200, headers);
    headers.a = "2";
    expect(res.headers).toEqual({ a: "1" });
    expect(Object.isFrozen(res.headers)).toBe(true);
  });

  it("copies header arrays and body bytes given to it", () => {
    const values = ["a", "b"];
    const bytes = Uint8Array.from([0x6f, 0x6b]);
    const res = new CannedResponse(200, { "x-id": values }, bytes);
    values.push("c");
    bytes[0] = 0x4e;

    expect(res.headers).toEqual({ "x-id": ["a", "b"] });
    expect(Object.isFrozen(res.headers["x-id"])).toBe(true);
    expect(res.equals(new CannedResponse(200, { "x-id": ["a", "b"] }, "ok"))).toBe(true);
  });

  it("returns a fresh copy of the body on each read", () => {
    const res = new CannedResponse(200, {}, "ok");
    const body = res.body;
    if (body) body[0] = 0x4e;
    expect(Buffer.from(res.body ?? new Uint8Array()).toString("utf-8")).toBe("ok");
  });

  it("rejects a status code that is not an integer", () => {
    expect(() => new CannedResponse(Number.NaN, {})).toThrow(StubClientError);
    expect(() => new CannedResponse(200.5, {})).toThrow(
      "Invalid CannedResponse code 200.5: status code must be an integer"
    );
  });

  it("builds JSON responses", () => {
    const res = CannedResponse.json({ a: 1 }, 202, { "x-trace": "t1" });
    expect(res.code).toBe(202);
    expect(res.headers).toEqual({ "content-type": "application/json", "x-trace": "t1" });
    expect(res.equals(new CannedResponse(202, res.headers, '{"a":1}'))).toBe(true);
    expect(res.toString()).toBe("CannedResponse(202)");
  });
});
