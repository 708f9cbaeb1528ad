import { ValidationError } from "yoguido-shared";
import { appConfigSchema, loadConfigFromEnv, resolveAppConfig } from "./config";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("resolveAppConfig", () => {
  it("should apply defaults", () => {
    expect(resolveAppConfig()).toEqual({
      title: "YoGuido",
      sessionTtlMs: 1_800_000,
      sweepIntervalMs: 60_000,
      basePath: "/_yg",
      logLevel: "info",
      stylesheets: [],
    });
  });

  it("should keep provided values", () => {
    const config = resolveAppConfig({ title: "Admin", handlerTimeoutMs: 500, basePath: "/ui/runtime" });

    expect(config).toMatchObject({ title: "Admin", handlerTimeoutMs: 500, basePath: "/ui/runtime" });
  });

  it("should flag wrong types with a type code", () => {
    const caught = captureError(() => resolveAppConfig({ title: 42 as unknown as string }));

    expect(caught).toMatchObject({ code: "VALIDATION_TYPE", field: "title" });
  });

  it("should name the offending field", () => {
    expect(() => resolveAppConfig({ basePath: "/_yg/" })).toThrow(
      'Invalid configuration: basePath: basePath must start with "/" and not end with one',
    );
  });

  it("should flag out-of-range values with a constraint code", () => {
    const caught = captureError(() => resolveAppConfig({ sessionTtlMs: -5 }));

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: "VALIDATION_CONSTRAINT", field: "sessionTtlMs" });
  });

  it("should reject unknown log levels", () => {
    const result = appConfigSchema.safeParse({ logLevel: "loud" });

    expect(result.success).toBe(false);
  });
});

describe("loadConfigFromEnv", () => {
  it("should read YOGUIDO_ variables", () => {
    const config = loadConfigFromEnv({
      YOGUIDO_TITLE: "Ops",
      YOGUIDO_BASE_PATH: "/rt",
      YOGUIDO_LOG_LEVEL: "debug",
      YOGUIDO_HANDLER_TIMEOUT_MS: "2500",
      YOGUIDO_SESSION_TTL_MS: "",
    });

    expect(config).toEqual({ title: "Ops", basePath: "/rt", logLevel: "debug", handlerTimeoutMs: 2500 });
  });

  it("should leave unset variables out", () => {
    expect(loadConfigFromEnv({})).toEqual({});
  });

  it("should reject malformed numbers and levels", () => {
    expect(() => loadConfigFromEnv({ YOGUIDO_SWEEP_INTERVAL_MS: "soon" })).toThrow(
      "YOGUIDO_SWEEP_INTERVAL_MS must be a number, received soon",
    );
    expect(() => loadConfigFromEnv({ YOGUIDO_LOG_LEVEL: "loud" })).toThrow(ValidationError);
  });
});
