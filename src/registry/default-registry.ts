import {
  checkAzureLogin,
  checkCluster,
  checkNetwork,
  connectArc,
  disconnectArc,
  ensureAzureCli,
  ensureAzureLogin,
  gatherFacts,
  initControlPlane,
  installContainerd,
  installKubeTools,
  joinCluster,
  prepareNode,
  resetNode,
  setHostname,
  setupFlux,
} from "../tasks/builtin/index.js";
import { defineRegistry, type TaskRegistry } from "./registry.js";

const nodePrep = [checkNetwork, gatherFacts, setHostname, prepareNode, installContainerd, installKubeTools];

/** The provisioning plans shipped with the CLI. */
export function createDefaultRegistry(): TaskRegistry {
  return defineRegistry((r) => {
    r.goal("VERIFY")
      .on("local_machine", [checkNetwork, gatherFacts, ensureAzureCli, checkAzureLogin])
      .on("control_plane", [checkNetwork, gatherFacts, checkCluster])
      .on("workers", [checkNetwork, gatherFacts]);

    r.goal("INIT")
      .on("local_machine", [checkNetwork, gatherFacts, ensureAzureCli, ensureAzureLogin])
      .on("control_plane", [...nodePrep, initControlPlane, setupFlux])
      .on("workers", [...nodePrep, joinCluster]);

    r.goal("ARC_CONNECT").on("local_machine", [checkNetwork, ensureAzureCli, ensureAzureLogin, connectArc]);

    r.goal("DESTROY")
      .on("local_machine", [ensureAzureCli, disconnectArc])
      .on("workers", [resetNode])
      .on("control_plane", [resetNode]);
  });
}
