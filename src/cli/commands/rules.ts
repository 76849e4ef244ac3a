import chalk from "chalk";
import { RULES } from "../../pipeline/rules.js";

export async function rulesCommand(): Promise<void> {
  console.log(chalk.cyan(`\n📋 ${RULES.length} rules\n`));
  for (const rule of RULES) {
    const severity = rule.severity === "blocking" ? chalk.red("blocking") : chalk.yellow("advisory");
    const scope = rule.scope === "artifact" ? rule.appliesTo.join(", ") : "file set";
    console.log(`${chalk.white(rule.id.padEnd(22))} ${severity}  ${chalk.gray(`[${scope}]`)}`);
    console.log(chalk.gray(`  ${rule.description}`));
  }
}
