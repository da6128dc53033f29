import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  applyConfigTemplate,
  generateDynamicConfig,
  generateRandomUserAgent,
  generateSmartHeaders,
  isTemplateName,
} from "../config/dynamic.js";
import {
  defaultConfig,
  loadConfig,
  mergeConfig,
  parseConfig,
  saveConfig,
} from "../config/loader.js";
import { DEFAULT_ACCEPT, DEFAULT_USER_AGENT } from "../config/schema.js";
import { ConfigError } from "../errors.js";

const CHROME_100_WINDOWS =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/100.0.0.0 Safari/537.36";

describe("config", () => {
  // -------------------------------------------------------------------------
  // Schema defaults
  // -------------------------------------------------------------------------
  describe("defaultConfig", () => {
    it("fills every section from an empty object", () => {
      expect(defaultConfig()).toEqual({
        download: {
          maxWorkers: 5,
          timeout: 30,
          chunkSize: 8192,
          retryCount: 3,
          retryBaseDelayMs: 2000,
          retryMaxDelayMs: 10000,
        },
        output: { baseDir: "./downloads", createSubfolder: false, overwriteExisting: false },
        network: {
          userAgent: DEFAULT_USER_AGENT,
          headers: { Accept: DEFAULT_ACCEPT },
          verifySsl: true,
        },
        browser: {
          engine: "chromium",
          headless: true,
          slowMo: 100,
          timeoutMs: 30000,
          networkIdleTimeoutMs: 15000,
          settleDelayMs: 2000,
        },
        logging: { level: "info" },
      });
    });

    it("rejects out-of-range values with the field path", () => {
      expect(() => parseConfig({ download: { maxWorkers: 0 } })).toThrow(
        "Invalid configuration: download.maxWorkers: Number must be greater than or equal to 1",
      );
    });
  });

  // -------------------------------------------------------------------------
  // mergeConfig
  // -------------------------------------------------------------------------
  describe("mergeConfig", () => {
    it("merges nested objects key by key", () => {
      const merged = mergeConfig(defaultConfig(), { network: { headers: { "X-Test": "1" } } });
      expect(merged.network.headers).toEqual({ Accept: DEFAULT_ACCEPT, "X-Test": "1" });
      expect(merged.network.verifySsl).toBe(true);
    });

    it("ignores undefined overrides", () => {
      const merged = mergeConfig(defaultConfig(), { output: { baseDir: undefined } });
      expect(merged.output.baseDir).toBe("./downloads");
    });

    it("re-validates the merged result", () => {
      expect(() => mergeConfig(defaultConfig(), { browser: { slowMo: -1 } })).toThrow(ConfigError);
    });
  });

  // -------------------------------------------------------------------------
  // loadConfig / saveConfig
  // -------------------------------------------------------------------------
  describe("files", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "pdf-harvest-config-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("loads a partial file over the defaults", async () => {
      const path = join(dir, "config.json");
      await writeFile(path, JSON.stringify({ download: { maxWorkers: 8 }, output: { baseDir: "./pdfs" } }));

      const config = loadConfig(path);

      expect(config.download.maxWorkers).toBe(8);
      expect(config.download.retryCount).toBe(3);
      expect(config.output.baseDir).toBe("./pdfs");
    });

    it("fails for an explicit path that does not exist", () => {
      const path = join(dir, "missing.json");
      expect(() => loadConfig(path)).toThrow(`Cannot read config file "${path}"`);
    });

    it("fails for malformed JSON", async () => {
      const path = join(dir, "config.json");
      await writeFile(path, "{ not json");
      expect(() => loadConfig(path)).toThrow(`Invalid JSON in config file "${path}"`);
    });

    it("fails for schema violations and names the file", async () => {
      const path = join(dir, "config.json");
      await writeFile(path, JSON.stringify({ network: { verifySsl: "yes" } }));

      let caught: unknown;
      try {
        loadConfig(path);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught instanceof ConfigError ? caught.path : undefined).toBe(path);
      expect(caught instanceof Error ? caught.message : "").toBe(
        `Invalid configuration in "${path}": network.verifySsl: Expected boolean, received string`,
      );
    });

    it("writes pretty JSON and round-trips", async () => {
      const path = join(dir, "config.json");
      const config = mergeConfig(defaultConfig(), { download: { maxWorkers: 7 } });

      expect(saveConfig(config, path)).toBeUndefined();

      expect(await readFile(path, "utf-8")).toBe(JSON.stringify(config, null, 2) + "\n");
      expect(loadConfig(path)).toEqual(config);
    });

    it("backs up the previous file before overwriting", async () => {
      const path = join(dir, "config.json");
      await writeFile(path, '{"download":{"maxWorkers":2}}');

      const backup = saveConfig(defaultConfig(), path, {
        backup: true,
        now: new Date(2024, 0, 2, 3, 4, 5),
      });

      expect(backup).toBe(join(dir, "config_backups", "config_backup_20240102_030405.json"));
      expect(await readFile(join(dir, "config_backups", "config_backup_20240102_030405.json"), "utf-8")).toBe(
        '{"download":{"maxWorkers":2}}',
      );
      expect(loadConfig(path).download.maxWorkers).toBe(5);
    });

    it("skips the backup when there is nothing to back up", () => {
      const path = join(dir, "fresh.json");
      expect(saveConfig(defaultConfig(), path, { backup: true })).toBeUndefined();
      expect(existsSync(join(dir, "config_backups"))).toBe(false);
    });
  });

  // -------------------------------------------------------------------------
  // Dynamic User-Agent and headers
  // -------------------------------------------------------------------------
  describe("generateRandomUserAgent", () => {
    it("picks the browser, template and version from the random source", () => {
      expect(generateRandomUserAgent(undefined, () => 0)).toBe(CHROME_100_WINDOWS);
    });

    it("uses the top of the version range", () => {
      expect(generateRandomUserAgent("firefox", () => 0.999)).toBe(
        "Mozilla/5.0 (X11; Linux x86_64; rv:120) Gecko/20100101 Firefox/120",
      );
    });

    it("keeps Safari versions in their own range", () => {
      expect(generateRandomUserAgent("safari", () => 0.5)).toBe(
        "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16 Safari/605.1.15",
      );
    });

    it("falls back to Chrome for unknown browsers", () => {
      expect(generateRandomUserAgent("opera", () => 0)).toBe(CHROME_100_WINDOWS);
    });
  });

  describe("generateSmartHeaders", () => {
    it("adds the site profile for known hosts", () => {
      const headers = generateSmartHeaders("https://law.moj.gov.tw/LawClass/List.aspx", undefined, () => 0);

      expect(headers.Referer).toBe("https://law.moj.gov.tw/");
      expect(headers["Cache-Control"]).toBe("no-cache");
      expect(headers["Accept-Language"]).toBe("zh-TW,zh;q=0.9,en;q=0.8");
      expect(headers["User-Agent"]).toBe(CHROME_100_WINDOWS);
      expect(headers["Sec-Fetch-Mode"]).toBe("navigate");
    });

    it("honours an explicit language for other hosts", () => {
      const headers = generateSmartHeaders("https://example.com/", "en-US", () => 0);

      expect(headers["Accept-Language"]).toBe("en-US,en;q=0.9");
      expect(headers.Referer).toBeUndefined();
    });
  });

  describe("generateDynamicConfig", () => {
    it("replaces the User-Agent and headers without touching the base", () => {
      const base = defaultConfig();

      const config = generateDynamicConfig(base, {
        targetUrl: "https://www.cec.gov.tw/central/cms",
        browserType: "edge",
        random: () => 0,
      });

      expect(config.network.userAgent).toBe(
        "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/100.0.0.0 Safari/537.36 Edg/100.0.0.0",
      );
      expect(config.network.headers.Referer).toBe("https://www.cec.gov.tw/");
      expect(config.network.headers["User-Agent"]).toBeUndefined();
      expect(config.network.verifySsl).toBe(true);
      expect(base.network.userAgent).toBe(DEFAULT_USER_AGENT);
      expect(base.network.headers).toEqual({ Accept: DEFAULT_ACCEPT });
    });
  });

  // -------------------------------------------------------------------------
  // Templates
  // -------------------------------------------------------------------------
  describe("applyConfigTemplate", () => {
    it("overlays the named template", () => {
      const config = applyConfigTemplate(defaultConfig(), "aggressive");

      expect(config.download.maxWorkers).toBe(16);
      expect(config.download.timeout).toBe(60);
      expect(config.download.retryCount).toBe(3);
      expect(config.network.verifySsl).toBe(false);
      expect(config.browser.slowMo).toBe(0);
    });

    it("falls back to minimal for unknown names", () => {
      const config = applyConfigTemplate(defaultConfig(), "turbo");
      expect(config.download.maxWorkers).toBe(4);
      expect(isTemplateName("turbo")).toBe(false);
      expect(isTemplateName("stealth")).toBe(true);
    });
  });
});
