import { readFileSync } from "node:fs";
import path from "node:path";
import { parse } from "dotenv";
import { ENV_SCHEMAS, type EnvCommand } from "../packages/shared/src/env/schema";
import { getMissingEnvVars } from "../packages/shared/src/env/validator";

const TEMPLATE_PATH = ".env.example";

function readTemplate(): Record<string, string> {
  const absolutePath = path.resolve(process.cwd(), TEMPLATE_PATH);
  return parse(readFileSync(absolutePath, "utf8"));
}

function isEnvCommand(value: string): value is EnvCommand {
  return value in ENV_SCHEMAS;
}

function main() {
  const template = readTemplate();
  const failures: string[] = [];

  Object.keys(ENV_SCHEMAS)
    .filter(isEnvCommand)
    .forEach(command => {
      const missing = getMissingEnvVars(command, template);
      if (missing.length) {
        failures.push(`${command}: missing ${missing.join(", ")}`);
      }
    });

  if (failures.length) {
    console.error(`Environment template ${TEMPLATE_PATH} does not satisfy the schema:\n`);
    failures.forEach(failure => console.error(` • ${failure}`));
    process.exitCode = 1;
    return;
  }

  console.log(`${TEMPLATE_PATH} satisfies every command:`, Object.keys(ENV_SCHEMAS).join(", "));
}

main();
