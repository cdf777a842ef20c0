import { readFile } from "node:fs/promises";
import { TaskExecutionError, errorMessage } from "../../errors.js";
import { quote, tail } from "../../utils/shell.js";
import { commandExists, defineTask, mustExec, outcome, requireSettings, succeeds } from "../define.js";
import { ADMIN_CONF } from "./control-plane.js";

const MARKER = "/var/lib/flux_bootstrapped";

export const setupFlux = defineTask({
  name: "setup-flux",
  description: "Install the Flux CLI and bootstrap GitOps",
  groups: ["control_plane"],
  async run(ctx) {
    const { flux } = requireSettings(ctx, "setup-flux").k8s;
    if (!flux.enabled) return outcome.skipped("Flux disabled");
    if (!flux.githubUrl || !flux.localKeyPath) {
      return outcome.failed("Flux is enabled but githubUrl or localKeyPath is not set");
    }

    let installed = false;
    if (!(await commandExists(ctx, "flux"))) {
      await mustExec(ctx, "curl -fsS https://fluxcd.io/install.sh | bash", "Installing Flux CLI", { sudo: true });
      installed = true;
    }

    if (await succeeds(ctx, `test -f ${MARKER}`)) {
      return installed ? outcome.changed("Flux CLI installed; bootstrap already done") : outcome.ok("Flux already bootstrapped");
    }

    let key: string;
    try {
      key = (await readFile(flux.localKeyPath, "utf-8")).trim() + "\n";
    } catch (err) {
      throw new TaskExecutionError(`Cannot read Flux deploy key ${flux.localKeyPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    // Staged files are removed when the task ends, timeouts and failures included.
    const keyFile = await ctx.stageFile(key);
    ctx.step("Bootstrapping Flux");
    const res = await ctx.exec(
      [
        "flux bootstrap git",
        `--url=${quote(flux.githubUrl)}`,
        `--branch=${quote(flux.branch)}`,
        `--path=${quote(flux.clusterPath)}`,
        `--private-key-file=${quote(keyFile)}`,
        "--silent",
      ].join(" "),
      { sudo: true, env: { KUBECONFIG: ADMIN_CONF } },
    );
    if (res.exitCode !== 0) return outcome.failed(`Flux bootstrap failed: ${tail(res.stderr || res.stdout)}`);

    await ctx.writeFile(MARKER, "bootstrapped\n", { sudo: true });
    return outcome.changed("GitOps pipeline active");
  },
});
