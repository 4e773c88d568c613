import { afterEach, describe, expect, it, vi } from "vitest";
import { getLogger, resolveLogLevel } from "../src/logger.ts";

describe("logger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
		vi.unstubAllEnvs();
	});

	it("filters messages below the configured level", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		const info = vi.spyOn(console, "info").mockImplementation(() => {});

		const log = getLogger("test", { level: "info" });
		log.debug("hidden");
		log.info("hello");

		expect(debug).not.toHaveBeenCalled();
		expect(info).toHaveBeenCalledWith("[nsvframe:test]", "hello");
	});

	it("passes context as a trailing argument", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		getLogger("test", { level: "debug" }).error("failed", { path: "a.nsv" });
		expect(error).toHaveBeenCalledWith("[nsvframe:test]", "failed", { path: "a.nsv" });
	});

	it("reads the level from NSV_LOG_LEVEL", () => {
		vi.stubEnv("NSV_LOG_LEVEL", "error");
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

		getLogger("test").warn("quiet");
		expect(warn).not.toHaveBeenCalled();
	});

	it("stays silent at the silent level", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		getLogger("test", { level: "silent" }).error("nothing");
		expect(error).not.toHaveBeenCalled();
	});

	it("falls back to warn for unknown levels", () => {
		expect(resolveLogLevel("DEBUG")).toBe("debug");
		expect(resolveLogLevel("verbose")).toBe("warn");
		expect(resolveLogLevel(undefined)).toBe("warn");
	});
});
