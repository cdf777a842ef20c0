import { mustExec, succeeds } from "../define.js";
import type { TaskContext } from "../types.js";
import { quote } from "../../utils/shell.js";

export type AptRepository = {
  name: string;
  /** The full `deb [...] url suite component` line. */
  line: string;
  keyUrl: string;
  keyPath: string;
};

/** Resolves to whether the key or the source list changed. */
export async function addAptRepository(ctx: TaskContext, repo: AptRepository): Promise<boolean> {
  let changed = false;
  if (!(await succeeds(ctx, `test -f ${quote(repo.keyPath)}`))) {
    await mustExec(ctx, "install -m 0755 -d /etc/apt/keyrings", "Creating /etc/apt/keyrings", { sudo: true });
    await mustExec(
      ctx,
      `curl -fsSL ${quote(repo.keyUrl)} | gpg --dearmor -o ${quote(repo.keyPath)}`,
      `Fetching the ${repo.name} signing key`,
      { sudo: true },
    );
    changed = true;
  }
  const listChanged = await ctx.writeFile(`/etc/apt/sources.list.d/${repo.name}.list`, repo.line + "\n", {
    mode: "644",
    sudo: true,
  });
  return changed || listChanged;
}

export async function aptInstall(ctx: TaskContext, packages: string[]): Promise<void> {
  await mustExec(
    ctx,
    `apt-get update -q && apt-get install -y -q ${packages.join(" ")}`,
    `Installing ${packages.join(", ")}`,
    { sudo: true, env: { DEBIAN_FRONTEND: "noninteractive" } },
  );
}
