import { describe, expect, it } from "vitest";
import {
  CodedError,
  CoderCatalogError,
  CoderRegistrationError,
  DefaultCoder,
  ErrcodeError,
  UNKNOWN_CODER,
  asCodedError,
  createCoder,
  isCodedError,
  withCode,
  wrapWithCode,
} from "../services/errors";

describe("Coder", () => {
  it("should expose the fields it was created with", () => {
    const coder = createCoder({
      code: 100601,
      httpStatus: 404,
      message: "Workspace not found",
      reference: "https://docs.example.com/errors#100601",
    });

    expect(coder.code).toBe(100601);
    expect(coder.httpStatus).toBe(404);
    expect(coder.message).toBe("Workspace not found");
    expect(coder.reference).toBe("https://docs.example.com/errors#100601");
    expect(String(coder)).toBe("Workspace not found");
  });

  it("should default the HTTP status to 500 when omitted", () => {
    expect(createCoder({ code: 100602, message: "x" }).httpStatus).toBe(500);
  });

  it("should default the HTTP status to 500 when zero", () => {
    expect(new DefaultCoder({ code: 100603, httpStatus: 0, message: "x" }).httpStatus).toBe(500);
  });

  it("should default the reference to an empty string", () => {
    expect(createCoder({ code: 100604, message: "x" }).reference).toBe("");
  });

  it("should describe the unknown coder", () => {
    expect(UNKNOWN_CODER.code).toBe(1);
    expect(UNKNOWN_CODER.httpStatus).toBe(500);
    expect(UNKNOWN_CODER.message).toBe("An internal server error occurred");
    expect(UNKNOWN_CODER.reference).toBe("README.md#error-codes");
  });
});

describe("CodedError", () => {
  it("should carry its code and message", () => {
    const error = withCode(100701, "user u_1 not found");

    expect(error).toBeInstanceOf(CodedError);
    expect(error).toBeInstanceOf(ErrcodeError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(100701);
    expect(error.message).toBe("user u_1 not found");
    expect(error.name).toBe("CodedError");
    expect(error.cause).toBeUndefined();
  });

  it("should keep the wrapped cause", () => {
    const cause = new Error("connection refused");
    const error = wrapWithCode(cause, 100702, "lookup failed");

    expect(error.cause).toBe(cause);
    expect(error.code).toBe(100702);
  });

  it("should return undefined when wrapping no error", () => {
    expect(wrapWithCode(undefined, 100703, "nothing")).toBeUndefined();
    expect(wrapWithCode(null, 100703, "nothing")).toBeUndefined();
  });

  it("should capture a stack trace", () => {
    expect(withCode(100704, "with stack").stack).toContain("with stack");
  });
});

describe("isCodedError / asCodedError", () => {
  it("should recognise coded errors", () => {
    const error = withCode(100801, "coded");

    expect(isCodedError(error)).toBe(true);
    expect(asCodedError(error)).toBe(error);
  });

  it("should reject everything else", () => {
    const lookalike = Object.assign(new Error("lookalike"), { code: 100801 });

    expect(isCodedError(lookalike)).toBe(false);
    expect(asCodedError(lookalike)).toBeUndefined();
    expect(asCodedError(null)).toBeUndefined();
    expect(asCodedError("coded")).toBeUndefined();
  });
});

describe("package errors", () => {
  it("should name registration errors after their class", () => {
    const error = new CoderRegistrationError("duplicate_code", 7, "code: 7 already exist");

    expect(error).toBeInstanceOf(ErrcodeError);
    expect(error.name).toBe("CoderRegistrationError");
    expect(error.reason).toBe("duplicate_code");
    expect(error.attemptedCode).toBe(7);
  });

  it("should keep catalog issues and cause", () => {
    const cause = new Error("ENOENT");
    const error = new CoderCatalogError("Unable to read coder catalog", {
      issues: ["ENOENT"],
      source: "codes.json",
      cause,
    });

    expect(error.name).toBe("CoderCatalogError");
    expect(error.issues).toEqual(["ENOENT"]);
    expect(error.source).toBe("codes.json");
    expect(error.cause).toBe(cause);
  });
});
