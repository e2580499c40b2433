import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";

import {
  configureLogger,
  debug,
  error,
  failure,
  info,
  logger,
  resetLogger,
  success,
  table,
  warn,
} from "../../../src/utils/logging.js";

describe("log level filtering", () => {
  let errorSpy: MockInstance;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
    configureLogger({ colors: false });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("filters messages below the configured level", () => {
    configureLogger({ level: "warn" });

    debug("debug message");
    info("info message");
    warn("warn message");
    error("error message");

    expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
      "[WARN] warn message",
      "[ERROR] error message",
    ]);
  });

  it("shows all messages at debug level", () => {
    configureLogger({ level: "debug" });

    debug("debug message");
    info("info message");
    warn("warn message");
    error("error message");

    expect(errorSpy).toHaveBeenCalledTimes(4);
  });

  it("hides debug messages at the default level", () => {
    debug("debug message");
    info("info message");

    expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
      "[INFO] info message",
    ]);
  });

  it("passes extra arguments through", () => {
    info("loaded", 3, "variables");

    expect(errorSpy).toHaveBeenCalledWith("[INFO] loaded", 3, "variables");
  });
});

describe("stream routing", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("never writes to stdout", () => {
    configureLogger({ level: "debug" });
    vi.spyOn(console, "error").mockImplementation(vi.fn());
    const logSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());
    const infoSpy = vi.spyOn(console, "info").mockImplementation(vi.fn());
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(vi.fn());

    debug("d");
    info("i");
    success("s");
    failure("f");

    expect(logSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
  });
});

describe("message formatting", () => {
  let errorSpy: MockInstance;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("labels each level when colors are enabled", () => {
    configureLogger({ level: "debug", colors: true });

    debug("test message");
    warn("test message");

    const first = errorSpy.mock.calls[0]?.[0] as string;
    const second = errorSpy.mock.calls[1]?.[0] as string;
    expect(first).toContain("[DEBUG]");
    expect(first).toContain("test message");
    expect(second).toContain("[WARN]");
  });

  it("formats messages without ANSI codes when colors are disabled", () => {
    configureLogger({ level: "debug", colors: false });

    debug("test");
    info("test");
    warn("test");
    error("test");

    expect(errorSpy.mock.calls.map((call) => call[0])).toEqual([
      "[DEBUG] test",
      "[INFO] test",
      "[WARN] test",
      "[ERROR] test",
    ]);
  });

  it("includes ISO timestamp in messages", () => {
    configureLogger({ timestamps: true, colors: false });

    info("test message");

    const message = errorSpy.mock.calls[0]?.[0] as string;
    // Should match: [2024-01-15T10:30:00.000Z] [INFO] test message
    expect(message).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] test message$/,
    );
  });
});

describe("success and failure", () => {
  let errorSpy: MockInstance;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("logs success message with emoji when colors enabled", () => {
    configureLogger({ colors: true });

    success("Operation complete");

    const message = errorSpy.mock.calls[0]?.[0] as string;
    expect(message).toContain("✅");
    expect(message).toContain("Operation complete");
  });

  it("logs success message with prefix when colors disabled", () => {
    configureLogger({ colors: false });

    success("Operation complete");

    expect(errorSpy).toHaveBeenCalledWith("[SUCCESS] Operation complete");
  });

  it("logs failure message with prefix when colors disabled", () => {
    configureLogger({ colors: false });

    failure("Operation failed");

    expect(errorSpy).toHaveBeenCalledWith("[FAILURE] Operation failed");
  });

  it("respects log level filtering", () => {
    configureLogger({ level: "error" });

    success("Should not appear");
    failure("Should not appear");

    expect(errorSpy).not.toHaveBeenCalled();
  });
});

describe("table", () => {
  it("pads columns to the widest cell", () => {
    const output = table(
      ["NAME", "VALUE"],
      [
        ["LOCATION", "us-central1"],
        ["IS_LOCAL", "false"],
      ],
    );

    expect(output.split("\n")).toEqual([
      "NAME     | VALUE      ",
      "---------+------------",
      "LOCATION | us-central1",
      "IS_LOCAL | false      ",
    ]);
  });

  it("renders headers alone for no rows", () => {
    expect(table(["NAME", "VALUE"], [])).toBe("NAME | VALUE\n-----+------");
  });
});

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("configure and reset change the active level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(vi.fn());

    logger.configure({ level: "error" });
    logger.info("hidden");
    logger.reset();
    logger.info("shown");

    expect(spy).toHaveBeenCalledTimes(1);
  });
});
