import { parseProvisionArgs } from "../provision-image/cli/args";
import { provisionImageUsage } from "../provision-image/cli/usage";
import { buildProvisionDryRunPlan } from "../provision-image/pipeline/plan";
import { executeProvision, preparePlan, type ProvisionDeps } from "../provision-image/pipeline/execute";
import { CliHelpRequested, CliUsageError } from "../shared/cli-errors";
import { renderCliError } from "../shared/render-cli-error";

export async function runProvisionImage(argv: string[], deps?: ProvisionDeps): Promise<number> {
  try {
    const options = parseProvisionArgs(argv);

    if (options.dryRun) {
      const plan = buildProvisionDryRunPlan(preparePlan(options));
      console.log(JSON.stringify(plan, null, 2));
      return 0;
    }

    const result = await executeProvision(options, deps);
    console.log(JSON.stringify(result, null, 2));
    return 0;
  } catch (error) {
    if (error instanceof CliHelpRequested) {
      console.log(provisionImageUsage());
      return 0;
    }

    console.error(renderCliError(error));

    if (error instanceof CliUsageError) {
      console.error("\n" + provisionImageUsage());
    }

    return 1;
  }
}
