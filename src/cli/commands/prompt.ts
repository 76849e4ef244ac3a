import chalk from "chalk";
import { getConfig } from "../../config/index.js";
import { PROMPT_VARIANTS, isPromptVariant, renderReadme, renderSystemPrompt } from "../../prompts/index.js";
import { ExitCode } from "../../utils/errors.js";
import { toNamespace } from "../../utils/naming.js";
import { splitModuleList } from "./validate.js";

interface PromptOptions {
  app?: string;
  modules?: string;
  namespace?: string;
}

export async function promptCommand(variant: string | undefined, options: PromptOptions): Promise<void> {
  const chosen = variant ?? "system";
  if (!isPromptVariant(chosen)) {
    console.error(chalk.red(`Unknown variant: ${chosen}`));
    console.error(chalk.gray(`Available: ${PROMPT_VARIANTS.join(", ")}`));
    process.exitCode = ExitCode.INPUT;
    return;
  }

  const { layout } = getConfig();
  const appName = options.app ?? "My App";
  const namespace = options.namespace || toNamespace(appName) || undefined;

  if (chosen === "system") {
    console.log(renderSystemPrompt(layout, namespace));
    return;
  }

  const modules = splitModuleList([options.modules ?? "utils, state, view, main"]);
  console.log(renderReadme({ appName, modules, layout, namespace }));
}
