export { checkNetwork } from "./network.js";
export { gatherFacts, isOsFacts, requireFacts, type OsFacts } from "./facts.js";
export { setHostname } from "./hostname.js";
export { prepareNode, resetNode } from "./node.js";
export { installContainerd } from "./containerd.js";
export { installKubeTools } from "./kube-tools.js";
export { checkCluster, initControlPlane, joinCluster } from "./control-plane.js";
export { setupFlux } from "./flux.js";
export { checkAzureLogin, connectArc, disconnectArc, ensureAzureCli, ensureAzureLogin } from "./azure.js";
