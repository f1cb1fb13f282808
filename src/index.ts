#!/usr/bin/env node
import cron from "node-cron";
import path from "node:path";
import { appConfig } from "./config.js";
import { readLinks } from "./links.js";
import { type MonitorDeps, runMonitorOnce } from "./monitor.js";
import { HttpProbeCollector } from "./probes.js";
import { ConsoleReporter, type MonitorReporter } from "./reporter.js";
import { BrowserScreenshotCapturer } from "./screenshot.js";
import { ContentVersionStore } from "./store.js";
import { TelegramReporter } from "./telegram.js";
import { errorMessage } from "./utils.js";

function buildDeps(): MonitorDeps {
  const reporters: MonitorReporter[] = [new ConsoleReporter(process.argv.includes("--verbose"))];
  if (appConfig.TELEGRAM_BOT_TOKEN && appConfig.TELEGRAM_CHAT_ID) {
    reporters.push(new TelegramReporter(appConfig.TELEGRAM_BOT_TOKEN, appConfig.TELEGRAM_CHAT_ID));
  }

  return {
    collector: new HttpProbeCollector({ timeoutMs: appConfig.PROBE_TIMEOUT_MS }),
    store: new ContentVersionStore({
      baseDir: path.resolve(appConfig.STORAGE_DIR),
      recheckThresholdMs: appConfig.RECHECK_THRESHOLD_SECONDS * 1000,
    }),
    screenshots: appConfig.SCREENSHOT_ENABLED
      ? new BrowserScreenshotCapturer({
          headless: appConfig.PLAYWRIGHT_HEADLESS,
          timeoutMs: appConfig.PROBE_TIMEOUT_MS,
          executablePath: appConfig.CHROMIUM_EXECUTABLE_PATH,
        })
      : null,
    reporters,
    stepDelayMs: appConfig.STEP_DELAY_MS,
    siteDelayMs: appConfig.SITE_DELAY_MS,
  };
}

async function main(): Promise<void> {
  const linksFile = process.argv.slice(2).find((arg) => !arg.startsWith("--")) ?? appConfig.LINKS_FILE;
  const links = readLinks(linksFile);
  if (links.length === 0) {
    throw new Error(`No links found in '${linksFile}'`);
  }

  const deps = buildDeps();
  console.log(`[MONITOR] Site health monitor starting with ${links.length} site(s) from ${linksFile}`);

  await runMonitorOnce(links, deps);

  if (!appConfig.CRON_SCHEDULE) return;
  if (!cron.validate(appConfig.CRON_SCHEDULE)) {
    throw new Error(`Invalid CRON_SCHEDULE: ${appConfig.CRON_SCHEDULE}`);
  }

  console.log(`[MONITOR] Scheduling runs: ${appConfig.CRON_SCHEDULE}`);
  let running = false;
  cron.schedule(appConfig.CRON_SCHEDULE, async () => {
    if (running) {
      console.log("[MONITOR] Previous run still in progress, skipping tick");
      return;
    }
    running = true;
    console.log(`[MONITOR] Scheduled run started at ${new Date().toISOString()}`);
    try {
      // Re-read so edits to the links file apply without a restart.
      await runMonitorOnce(readLinks(linksFile), deps);
      console.log("[MONITOR] Scheduled run completed.");
    } catch (err) {
      console.error("[MONITOR] Scheduled run error:", errorMessage(err));
    } finally {
      running = false;
    }
  });
}

main().catch((e) => {
  console.error("[MONITOR] Fatal:", errorMessage(e));
  process.exit(1);
});
