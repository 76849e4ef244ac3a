import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  ConfigError,
  ErrorCode,
  ExitCode,
  InputError,
  ProjectIoError,
  errorMessage,
  toExitCode,
} from "../utils/errors.js";

describe("errors", () => {
  it("builds an InputError from zod issues", () => {
    const parsed = z.object({ name: z.string().min(1, "Name must not be empty") }).safeParse({ name: "" });
    if (parsed.success) throw new Error("expected a parse failure");

    const error = InputError.fromZodError(parsed.error);

    expect(error.message).toBe("Invalid input: Name must not be empty");
    expect(error.issues).toEqual([{ path: "name", message: "Name must not be empty" }]);
    expect(error.code).toBe(ErrorCode.INPUT_ERROR);
  });

  it("serialises code, message and details", () => {
    const error = new ProjectIoError("Could not write index.html", "index.html");

    expect(error.toJSON()).toEqual({
      error: true,
      code: "PROJECT_IO_ERROR",
      message: "Could not write index.html",
      details: { filePath: "index.html" },
    });
  });

  it("omits details when there are none", () => {
    expect(new InputError("Bad").toJSON()).toEqual({ error: true, code: "INPUT_ERROR", message: "Bad" });
  });

  it("maps errors to exit codes", () => {
    expect(toExitCode(new InputError("Bad"))).toBe(ExitCode.INPUT);
    expect(toExitCode(new ConfigError("Bad"))).toBe(ExitCode.INPUT);
    expect(toExitCode(new ProjectIoError("Bad", "x"))).toBe(ExitCode.FAILURE);
    expect(toExitCode("boom")).toBe(ExitCode.FAILURE);
  });

  it("extracts a message from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
