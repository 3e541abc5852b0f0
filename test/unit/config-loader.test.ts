import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, substituteEnv } from "../../src/config/loader.js";
import { parseConfig, validateChatConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TOKEN"] = "test-secret";
    process.env["TEST_CHANNEL"] = "coolstreamer";
  });

  afterEach(() => {
    delete process.env["TEST_TOKEN"];
    delete process.env["TEST_CHANNEL"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("token: ${env:TEST_TOKEN}")).toBe("token: test-secret");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_CHANNEL}:${env:TEST_TOKEN}")).toBe(
      "coolstreamer:test-secret",
    );
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.chat.platform).toBe("twitch");
    expect(config.timers).toEqual({
      breakReminderMinutes: 120,
      hydrationReminderMinutes: 45,
      postureReminderMinutes: 90,
      streamDurationAlertMinutes: 240,
      messages: {},
    });
    expect(config.context).toEqual({
      quietThresholdSeconds: 30,
      hypeCooldownSeconds: 60,
      hypeKeywords: ["hype", "pog", "lets go", "amazing", "incredible"],
      waitForQuiet: true,
    });
    expect(config.scheduler.pollIntervalSeconds).toBe(10);
    expect(config.notifications.appName).toBe("Coach");
    expect(config.commands.prefix).toBe("!coach");
    expect(config.status).toEqual({ enabled: false, port: 19877, hostname: "127.0.0.1" });
  });

  it("keeps valid overrides", () => {
    const config = parseConfig({
      chat: { platform: "discord", channel: "123", token: "test-token" },
      timers: { hydrationReminderMinutes: 30, postureReminderMinutes: 0 },
      context: { waitForQuiet: false },
    });
    expect(config.chat.platform).toBe("discord");
    expect(config.timers.hydrationReminderMinutes).toBe(30);
    expect(config.timers.postureReminderMinutes).toBe(0);
    expect(config.timers.breakReminderMinutes).toBe(120);
    expect(config.context.waitForQuiet).toBe(false);
  });

  it("falls back to defaults for malformed timer values", () => {
    const config = parseConfig({
      timers: { breakReminderMinutes: "soon", hydrationReminderMinutes: -5 },
    });
    expect(config.timers.breakReminderMinutes).toBe(120);
    expect(config.timers.hydrationReminderMinutes).toBe(45);
  });

  it("falls back to defaults for malformed context values", () => {
    const config = parseConfig({
      context: { quietThresholdSeconds: "quiet", hypeKeywords: "pog" },
    });
    expect(config.context.quietThresholdSeconds).toBe(30);
    expect(config.context.hypeKeywords).toContain("pog");
    expect(config.context.hypeKeywords).toHaveLength(5);
  });

  it("replaces a timers section that is not an object", () => {
    const config = parseConfig({ timers: "often" });
    expect(config.timers.postureReminderMinutes).toBe(90);
  });

  it("rejects an unknown chat platform", () => {
    expect(() => parseConfig({ chat: { platform: "irc" } })).toThrow();
  });

  it("rejects an invalid notification backend", () => {
    expect(() => parseConfig({ notifications: { backend: "pager" } })).toThrow();
  });
});

describe("validateChatConfig", () => {
  it("accepts anonymous twitch chat", () => {
    expect(
      validateChatConfig({ platform: "twitch", channel: "coolstreamer" }),
    ).toEqual([]);
  });

  it("requires a channel", () => {
    expect(validateChatConfig({ platform: "twitch", channel: "" })).toEqual([
      "chat.channel must be the Twitch channel to join",
    ]);
  });

  it("requires a username alongside a twitch token", () => {
    expect(
      validateChatConfig({ platform: "twitch", channel: "coolstreamer", token: "test-token" }),
    ).toEqual(["chat.username is required when chat.token is set"]);
  });

  it("requires a discord token and channel id", () => {
    expect(validateChatConfig({ platform: "discord", channel: "" })).toEqual([
      "chat.channel must be the Discord channel id to watch",
      "chat.token (Discord bot token) is required",
    ]);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "coach-config-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    delete process.env["TEST_CHANNEL"];
  });

  it("returns defaults when the file does not exist", () => {
    const config = loadConfig(join(tempDir, "missing.json"));
    expect(config.timers.breakReminderMinutes).toBe(120);
  });

  it("reads a file with env substitution", () => {
    process.env["TEST_CHANNEL"] = "coolstreamer";
    const configPath = join(tempDir, "coach.config.json");
    writeFileSync(
      configPath,
      JSON.stringify({ chat: { channel: "${env:TEST_CHANNEL}" } }),
    );

    expect(loadConfig(configPath).chat.channel).toBe("coolstreamer");
  });

  it("throws on invalid JSON", () => {
    const configPath = join(tempDir, "broken.json");
    writeFileSync(configPath, "{ not json");
    expect(() => loadConfig(configPath)).toThrow(SyntaxError);
  });
});
