import chalk from "chalk";

import { ConfigManager } from "../../lib/config-manager.js";

export type ConfigCommandArgs = {
  path?: string;
  setServer?: string;
};

/**
 * Print the effective configuration, or persist a new server URL
 */
export async function run(argv: ConfigCommandArgs): Promise<void> {
  const manager = argv.path ? new ConfigManager(argv.path) : new ConfigManager();

  try {
    const config = argv.setServer
      ? manager.updateAuthServerUrl(argv.setServer)
      : manager.load();
    if (argv.setServer) {
      console.info(chalk.green(`Saved ${manager.getPath()}`));
    }
    console.info(JSON.stringify(config, null, 2));
  } catch (err) {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exitCode = 1;
  }
}
