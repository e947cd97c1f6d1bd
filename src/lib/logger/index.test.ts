import { describe, expect, it } from "vitest";
import { createLogger, createSilentLogger } from "./index.js";

interface LogEntry {
	readonly msg?: string;
	readonly strategy?: string;
	readonly module?: string;
}

function capture(): { lines: string[]; destination: { write(msg: string): void } } {
	const lines: string[] = [];
	return {
		lines,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	};
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("writes structured JSON lines with the message", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.info({ strategy: "bull_call_spread" }, "computed");

			expect(lines).toHaveLength(1);
			const entry = JSON.parse(lines[0] ?? "{}") as LogEntry;
			expect(entry.msg).toBe("computed");
			expect(entry.strategy).toBe("bull_call_spread");
		});

		it("child logger carries its bindings", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination }).child({ module: "simulator" });

			logger.warn("bad input");

			const entry = JSON.parse(lines[0] ?? "{}") as LogEntry;
			expect(entry.module).toBe("simulator");
			expect(entry.msg).toBe("bad input");
		});
	});

	describe("child levels", () => {
		it("lets a child log below its parent's level", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.child({ module: "simulator" }, { level: "debug" }).debug("detail");
			logger.debug("dropped");

			expect(lines).toHaveLength(1);
			const entry = JSON.parse(lines[0] ?? "{}") as LogEntry;
			expect(entry.msg).toBe("detail");
			expect(entry.module).toBe("simulator");
		});

		it("lets a child raise its threshold", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "debug", destination });

			logger.child({ module: "simulator" }, { level: "error" }).warn("dropped");

			expect(lines).toHaveLength(0);
		});
	});

	describe("redact paths", () => {
		it("censors configured paths in log output", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", redactPaths: ["secret"], destination });

			logger.info({ secret: "test-secret", safe: "visible" }, "test");

			const output = lines.join("");
			expect(output).not.toContain("test-secret");
			expect(output).toContain("visible");
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "warn", destination });

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(lines.length).toBe(1);
			expect(lines[0]).toContain("should appear");
		});

		it("accepts every level", () => {
			const levels = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
			for (const level of levels) {
				expect(() => createLogger({ level })).not.toThrow();
			}
		});
	});

	describe("createSilentLogger", () => {
		it("accepts calls without throwing", () => {
			const logger = createSilentLogger();
			expect(() => logger.error({ code: "X" }, "ignored")).not.toThrow();
			expect(() => logger.child({ a: 1 }).info("ignored")).not.toThrow();
			expect(() => logger.child({ a: 1 }, { level: "debug" }).debug("ignored")).not.toThrow();
		});
	});

	describe("adversarial", () => {
		it("does not throw when logging undefined or null values", () => {
			const logger = createLogger({ level: "info" });
			expect(() => logger.info(undefined as unknown as string)).not.toThrow();
			expect(() => logger.info(null as unknown as string)).not.toThrow();
		});
	});
});
