import chalk from "chalk";
import { clearConfig, getConfig, getStoredConfig, setStoredValue } from "../../config/index.js";
import { errorMessage, toExitCode } from "../../utils/errors.js";

export async function configShowCommand(): Promise<void> {
  const config = getConfig();
  const stored = getStoredConfig();

  console.log(chalk.cyan("\n⚙  Effective configuration\n"));
  const rows: [string, string][] = [
    ["outDir", config.outDir],
    ["namespace", config.namespace || "(derived from app name)"],
    ["shellFile", config.layout.shellFile],
    ["stylesheetFile", config.layout.stylesheetFile],
    ["scriptDir", config.layout.scriptDir],
    ["bridgeFile", config.layout.bridgeFile],
    ["logLevel", config.logLevel],
  ];
  for (const [key, value] of rows) {
    const marker = key in stored ? chalk.green(" (stored)") : "";
    console.log(chalk.gray(`  ${key.padEnd(16)}`) + chalk.white(value) + marker);
  }
}

export async function configSetCommand(key: string, value: string): Promise<void> {
  try {
    setStoredValue(key, value);
    console.log(chalk.green(`✓ ${key} = ${value}`));
  } catch (error) {
    console.error(chalk.red("✗"), errorMessage(error));
    process.exitCode = toExitCode(error);
  }
}

export async function configResetCommand(): Promise<void> {
  clearConfig();
  console.log(chalk.green("✓ Stored configuration cleared"));
}
