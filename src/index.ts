import 'dotenv/config';
import { loadBotSettings, parseConfig } from './config.js';
import { createBootLogger, createLogger } from './logging/logger.js';
import { respawnProcess, runSupervisor } from './supervisor.js';

const bootStartMs = Date.now();
const bootLog = createBootLogger();

let parsedConfig: ReturnType<typeof parseConfig>;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  bootLog.error({ err }, 'Invalid configuration');
  process.exit(1);
}
const cfg = parsedConfig.config;

const log = createLogger(cfg);

for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}

const settings = await loadBotSettings(cfg.configPath, log);

const controller = new AbortController();
const shutdown = (signal: NodeJS.Signals) => {
  if (controller.signal.aborted) return;
  log.info({ signal }, 'shutdown:signal received');
  controller.abort();
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

const exit = await runSupervisor({
  config: cfg,
  settings,
  log,
  signal: controller.signal,
  startedAt: bootStartMs,
});

if (exit.restart) {
  respawnProcess(log);
}
log.info({ code: exit.code, reason: exit.reason }, 'shutdown:exiting');
process.exit(exit.code);
