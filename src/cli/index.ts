#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import figlet from "figlet";
import { generateCommand } from "./commands/generate.js";
import { validateCommand } from "./commands/validate.js";
import { rulesCommand } from "./commands/rules.js";
import { promptCommand } from "./commands/prompt.js";
import { configResetCommand, configSetCommand, configShowCommand } from "./commands/config.js";

function printBanner(): void {
  console.log(
    chalk.cyan(
      figlet.textSync("dualmode", {
        font: "Small",
        horizontalLayout: "default",
      })
    )
  );
  console.log(chalk.gray("  Static scaffolds that run from file:// and under a bundler\n"));
}

const program = new Command();

program
  .name("dualmode")
  .description("Generate and validate dual-mode static web scaffolds")
  .version("1.0.0")
  .hook("preAction", (_program, actionCommand) => {
    // Keep stdout clean for machine-readable output and pipes
    if (process.stdout.isTTY && !actionCommand.opts<{ json?: boolean }>().json) {
      printBanner();
    }
  });

// Generate command
program
  .command("generate")
  .description("Generate a scaffold: shell markup, stylesheet, one script per module, bridge")
  .argument("[appName]", "App name (also the source of the shared namespace)")
  .argument("[modules...]", "Module names in dependency order")
  .option("-o, --out <dir>", "Output directory")
  .option("-n, --namespace <id>", "Shared namespace identifier (default: derived from the app name)")
  .option("--dry-run", "Print the files instead of writing them")
  .option("-f, --force", "Overwrite existing files")
  .action(generateCommand);

// Validate command
program
  .command("validate")
  .description("Validate a scaffold on disk against the rule set")
  .argument("[dir]", "Project directory", ".")
  .option("-m, --modules <list>", "Declared module order, comma-separated")
  .option("-n, --namespace <id>", "Shared namespace identifier (default: inferred)")
  .option("--json", "Print the report as JSON")
  .action(validateCommand);

// Rules command
program
  .command("rules")
  .description("List the rule set")
  .action(rulesCommand);

// Prompt command
program
  .command("prompt")
  .description("Print authoring guidance: the model system prompt or a README")
  .argument("[variant]", "system | readme", "system")
  .option("-a, --app <name>", "App name")
  .option("-m, --modules <list>", "Module names for the README, comma-separated")
  .option("-n, --namespace <id>", "Shared namespace identifier")
  .action(promptCommand);

// Config command
const configCommand = program.command("config").description("Show or change stored defaults");

configCommand
  .command("show", { isDefault: true })
  .description("Show the effective configuration")
  .action(configShowCommand);

configCommand
  .command("set")
  .description("Store a default (outDir, namespace, shellFile, stylesheetFile, scriptDir, bridgeFile)")
  .argument("<key>")
  .argument("<value>")
  .action(configSetCommand);

configCommand
  .command("reset")
  .description("Clear stored defaults")
  .action(configResetCommand);

// Parse arguments
await program.parseAsync();
