import { describe, it, expect } from "vitest";
import { AppError, errorMessage } from "./app-error.js";
import { NotFoundError, ValidationError, ExternalServiceError } from "./errors.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("socket hang up");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      details: { model: "gemma3:12b" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ model: "gemma3:12b" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true and leaves cause unset", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
    expect(err.cause).toBeUndefined();
  });

  it("isAppError detects AppError instances", () => {
    const appErr = new AppError({ message: "test", statusCode: 500, code: "ERR" });

    expect(AppError.isAppError(appErr)).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });

  it("serializes name, code, message and details for logging", () => {
    const err = new AppError({
      message: "boom",
      statusCode: 500,
      code: "ERR",
      details: { chunkIndex: 2 },
    });

    expect(err.toJSON()).toEqual({
      name: "AppError",
      code: "ERR",
      message: "boom",
      details: { chunkIndex: 2 },
    });
  });

  it("omits details from the serialized form when absent", () => {
    const err = new AppError({ message: "boom", statusCode: 500, code: "ERR" });
    expect(err.toJSON()).toEqual({ name: "AppError", code: "ERR", message: "boom" });
  });
});

describe("errorMessage", () => {
  it("reads the message of Error instances", () => {
    expect(errorMessage(new TypeError("bad input"))).toBe("bad input");
  });

  it("passes strings through and stringifies everything else", () => {
    expect(errorMessage("offline")).toBe("offline");
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage(undefined)).toBe("undefined");
  });
});

describe("Error Subclasses", () => {
  describe("NotFoundError", () => {
    it("has status 404 and NOT_FOUND code", () => {
      const err = new NotFoundError();
      expect(err.statusCode).toBe(404);
      expect(err.code).toBe("NOT_FOUND");
      expect(err.message).toBe("Resource not found");
      expect(err.name).toBe("NotFoundError");
      expect(err).toBeInstanceOf(AppError);
    });

    it("accepts custom message and details", () => {
      const err = new NotFoundError("Transcript file not found", {
        details: { path: "missing.txt" },
      });
      expect(err.message).toBe("Transcript file not found");
      expect(err.details).toEqual({ path: "missing.txt" });
    });
  });

  describe("ValidationError", () => {
    it("has status 400, VALIDATION_ERROR code, and fields", () => {
      const fields = { chunkSize: "must be a positive integer" };
      const err = new ValidationError("Invalid chunk parameters", fields);
      expect(err.statusCode).toBe(400);
      expect(err.code).toBe("VALIDATION_ERROR");
      expect(err.fields).toEqual(fields);
      expect(err.name).toBe("ValidationError");
    });
  });

  describe("ExternalServiceError", () => {
    it("has status 502, EXTERNAL_SERVICE_ERROR code, and service", () => {
      const err = new ExternalServiceError("Ollama is down", "openai-compatible");
      expect(err.statusCode).toBe(502);
      expect(err.code).toBe("EXTERNAL_SERVICE_ERROR");
      expect(err.service).toBe("openai-compatible");
      expect(err.name).toBe("ExternalServiceError");
    });
  });
});
