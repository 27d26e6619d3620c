import { describe, expect, it } from "vitest";
import { codeForStatus, errorEnvelope } from "../../libs/error-response.js";
import { describeError } from "../../app.js";

describe("errorEnvelope", () => {
  it("omits details when none are given", () => {
    expect(errorEnvelope(404, "NOT_FOUND", "User not found.")).toEqual({
      status: 404,
      error: { code: "NOT_FOUND", message: "User not found." },
    });
    expect("details" in errorEnvelope(404, "NOT_FOUND", "x")).toBe(false);
  });

  it("keeps details when given", () => {
    expect(errorEnvelope(400, "VALIDATION_FAILED", "bad", { field: "email" }).details).toEqual({
      field: "email",
    });
  });
});

describe("codeForStatus", () => {
  it("maps known statuses and falls back to INTERNAL", () => {
    expect(codeForStatus(400)).toBe("VALIDATION_FAILED");
    expect(codeForStatus(413)).toBe("PAYLOAD_TOO_LARGE");
    expect(codeForStatus(429)).toBe("RATE_LIMITED");
    expect(codeForStatus(418)).toBe("INTERNAL");
  });
});

describe("describeError", () => {
  it("reads status, validation and message from error-like objects", () => {
    const err = Object.assign(new Error("body/email must match format"), {
      statusCode: 400,
      validation: [{ instancePath: "/email" }],
    });
    expect(describeError(err)).toEqual({
      statusCode: 400,
      validation: [{ instancePath: "/email" }],
      message: "body/email must match format",
    });
  });

  it("ignores status codes outside the error range", () => {
    expect(describeError({ statusCode: 200, message: "ok" })).toEqual({ message: "ok" });
    expect(describeError({ statusCode: "400" })).toEqual({ message: "" });
  });

  it("handles non-object throws", () => {
    expect(describeError("boom")).toEqual({ message: "boom" });
    expect(describeError(undefined)).toEqual({ message: "" });
    expect(describeError(null)).toEqual({ message: "" });
  });
});
