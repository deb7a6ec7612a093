import type { EnvPair, ProvisionPlan } from "../types";

const BARE_ENV_VALUE = /^[A-Za-z0-9_./:,@+-]*$/;

function quoteEnvValue(value: string): string {
  if (value.length > 0 && BARE_ENV_VALUE.test(value)) {
    return value;
  }
  return `"${value.replace(/[\\"$]/g, (char) => `\\${char}`)}"`;
}

export function renderEnvInstruction(env: EnvPair[]): string {
  return `ENV ${env.map((pair) => `${pair.key}=${quoteEnvValue(pair.value)}`).join(" ")}`;
}

/**
 * One blank-line separated block per provisioning step, in plan order.
 * The plan owns step order, so the source copy always precedes USER.
 */
export function renderDockerfile(plan: ProvisionPlan): string {
  const blocks = plan.steps.map((step) => step.instructions.join("\n"));
  return `${blocks.join("\n\n")}\n`;
}
