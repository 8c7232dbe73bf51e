#!/usr/bin/env node
import chalk from "chalk";
import { render } from "ink";
import App from "./App";
import { HELP_TEXT, packageVersion, parseCli, resolveInitialTargets } from "./cli";
import { loadConfig } from "./config";
import { createProbe } from "./engine/probes";
import { Session } from "./engine/session";
import { createDnsApplier } from "./platform";
import { errorMessage, InitializationError } from "./utils/errors";
import { logger, setLoggingEnabled } from "./utils/logger";
import { detectDistro, DISTRO_NAMES, loadMirrorCatalog, mirrorTargets } from "./utils/mirrors";

async function main(): Promise<void> {
  const cli = parseCli(process.argv.slice(2));
  if (cli.help) {
    process.stdout.write(HELP_TEXT);
    return;
  }
  if (cli.version) {
    process.stdout.write(`${packageVersion()}\n`);
    return;
  }

  const config = loadConfig(cli.overrides);
  setLoggingEnabled(config.debug);
  logger.debug("config", config);

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new InitializationError("dnspeed needs an interactive terminal");
  }

  const initial = await resolveInitialTargets(cli.input, config.mode);

  const distro = await detectDistro();
  const catalog = await loadMirrorCatalog();

  const session = new Session({
    config,
    probe: createProbe(config),
    applier: createDnsApplier(),
    mirrorSet: mirrorTargets(catalog, distro),
    initialTargets: initial.targets,
    initialSkipped: initial.skipped,
    initialRejected: initial.rejected,
  });

  const { waitUntilExit } = render(
    <App session={session} timeoutMs={config.timeoutMs} distro={DISTRO_NAMES[distro]} />,
    { exitOnCtrlC: false },
  );
  await waitUntilExit();
  // Quit has already cancelled the worker; let it and any apply or export finish.
  await session.idle();
  process.exit(0);
}

main().catch((e: unknown) => {
  logger.error("fatal", e);
  process.stderr.write(`${chalk.red(errorMessage(e))}\n`);
  process.exit(1);
});
