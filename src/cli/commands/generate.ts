import chalk from "chalk";
import ora from "ora";
import prompts from "prompts";
import { getConfig, validateConfig } from "../../config/index.js";
import { runScaffold } from "../../pipeline/index.js";
import { writeProject } from "../../tools/projectFiles.js";
import { ExitCode, errorMessage, toExitCode } from "../../utils/errors.js";
import { printReport, splitModuleList } from "./validate.js";
import type { PipelineStepName } from "../../pipeline/types.js";

interface GenerateOptions {
  out?: string;
  namespace?: string;
  dryRun?: boolean;
  force?: boolean;
}

/** Ask for whatever the command line left out. Returns null if the user cancels. */
async function askForMissing(
  appName: string | undefined,
  modules: string[]
): Promise<{ appName: string; modules: string[] } | null> {
  let name = appName;
  let list = modules;

  if (!name) {
    const response = await prompts({
      type: "text",
      name: "appName",
      message: "App name:",
      validate: (v: string) => v.trim().length > 0 || "App name cannot be empty",
    });
    name = typeof response.appName === "string" ? response.appName : undefined;
    if (!name) return null;
  }

  if (list.length === 0) {
    const response = await prompts({
      type: "list",
      name: "modules",
      message: "Modules, in dependency order (comma-separated):",
      initial: "utils, state, view, main",
      separator: ",",
    });
    const answer: unknown = response.modules;
    if (!Array.isArray(answer)) return null;
    list = splitModuleList(answer.filter((v): v is string => typeof v === "string"));
  }

  return { appName: name, modules: list };
}

export async function generateCommand(
  appNameArg: string | undefined,
  modulesArg: string[],
  options: GenerateOptions
): Promise<void> {
  const config = getConfig();
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    for (const e of configErrors) console.error(chalk.red(`✗ ${e}`));
    process.exitCode = ExitCode.INPUT;
    return;
  }

  let appName = appNameArg;
  let modules = splitModuleList(modulesArg);

  if ((!appName || modules.length === 0) && process.stdin.isTTY) {
    const answers = await askForMissing(appName, modules);
    if (!answers) {
      console.log(chalk.gray("\nCancelled."));
      return;
    }
    ({ appName, modules } = answers);
  }

  const stepLabels: Record<PipelineStepName, string> = {
    generate: "Generated",
    validate: "Validated",
  };
  const spinner = ora({ text: "Generating scaffold...", color: "cyan" }).start();

  try {
    const result = runScaffold({
      appName: appName ?? "",
      modules,
      layout: config.layout,
      namespace: options.namespace || config.namespace || undefined,
      onStepComplete: (step) => {
        spinner.text = `${stepLabels[step]}...`;
      },
    });

    if (options.dryRun) {
      spinner.succeed(`Generated ${result.files.length} file(s) (dry run, nothing written)`);
      for (const file of result.files) {
        console.log(chalk.cyan(`\n── ${file.path} (${file.role}) ──`));
        console.log(file.content);
      }
    } else {
      spinner.text = "Writing files...";
      const written = writeProject(options.out ?? config.outDir, result.files, { force: options.force });
      spinner.succeed(`Wrote ${written.files.length} file(s) to ${written.projectDir}`);
      for (const path of written.files) {
        console.log(chalk.gray(`  ${path}`));
      }
      console.log(chalk.gray(`  Size: ${(written.totalSize / 1024).toFixed(1)} KB`));
    }

    console.log(chalk.gray(`  Namespace: ${result.namespace}`));
    printReport(result.report);
    process.exitCode = result.report.valid ? ExitCode.OK : ExitCode.VIOLATIONS;
  } catch (error) {
    spinner.fail("Generation failed");
    console.error(chalk.red("✗"), errorMessage(error));
    process.exitCode = toExitCode(error);
  }
}
