import fs from "node:fs";
import { render } from "ink";
import React from "react";
import { App } from "./components/App";
import { ErrorBoundary } from "./components/ErrorBoundary";
import { applyOverrides, loadConfig } from "./config/app-config";
import { parseCliArgs, USAGE } from "./config/cli-args";
import { CONFIG_PATH } from "./config/paths";
import { AppStateProvider, initialState } from "./contexts/AppStateContext";
import { setupGlobalErrorHandlers } from "./services/error-handler";
import { initializeLogger, log } from "./services/logger";
import { createSessionDriver } from "./services/session-driver";
import { SystemdApiService } from "./services/systemd-api-service";

function readVersion(): string {
  try {
    const text = fs.readFileSync(new URL("../package.json", import.meta.url), "utf8");
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
  } catch (error) {
    log.warn("Could not read package version", "main", error instanceof Error ? error.message : error);
  }
  return "0.0.0";
}

/** Returns the function that puts the main screen back; safe to call twice. */
function setupAlternateScreen(): () => void {
  const out = process.stdout;
  if (!out.isTTY) return () => {};

  let restored = false;
  const restore = () => {
    if (restored) return;
    restored = true;
    out.write("\u001B[?1049l");
  };

  out.write("\u001B[?1049h");
  process.on("exit", restore);
  const onSignal = (code: number) => () => {
    restore();
    process.exit(code);
  };
  process.on("SIGINT", onSignal(130));
  process.on("SIGTERM", onSignal(143));
  process.on("SIGHUP", onSignal(129));
  return restore;
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.isErr()) {
    process.stderr.write(`${args.error}\n${USAGE}\n`);
    process.exit(2);
  }

  const version = readVersion();
  if (args.value.showVersion) {
    process.stdout.write(`sysdeck ${version}\n`);
    return;
  }

  const logger = initializeLogger();
  const config = applyOverrides(
    await loadConfig(args.value.configPath ?? CONFIG_PATH),
    args.value.overrides,
  );

  log.info("sysdeck session started", "main", {
    sessionId: logger.getSessionId(),
    logFile: logger.getLogFilePath(),
    scope: config.scope,
    category: config.category,
  });

  const source = new SystemdApiService({
    systemctl: config.systemctl,
    journalctl: config.journalctl,
    actionTimeoutMs: config.actionTimeoutMs,
  });
  const driver = createSessionDriver(source, source, {
    logLimit: config.logLimit,
    tailIntervalMs: config.tailIntervalMs,
    blinkIntervalMs: config.blinkIntervalMs,
  });

  const restore = setupAlternateScreen();
  setupGlobalErrorHandlers(restore);

  const onExit = () => {
    restore();
    log.info("sysdeck session ended", "main");
  };

  const instance = render(
    <ErrorBoundary onExit={(code) => {
      onExit();
      process.exit(code);
    }}>
      <AppStateProvider
        initialState={{
          filters: { ...initialState.filters, category: config.category, scope: config.scope },
        }}
      >
        <App driver={driver} version={version} onExit={onExit} />
      </AppStateProvider>
    </ErrorBoundary>,
    { exitOnCtrlC: false },
  );

  await instance.waitUntilExit();
  await logger.close().match(
    () => {},
    (error) => {
      process.stderr.write(`Failed to flush session log: ${error.message}\n`);
    },
  );
  process.exit(0);
}

main().catch((error: unknown) => {
  log.error("Failed to start sysdeck", "main", error instanceof Error ? error.stack : error);
  process.stderr.write(`Failed to start sysdeck: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
