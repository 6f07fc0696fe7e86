export type { RoutingCollaborators } from "./collaborators.js";
export { GraphCollaborators } from "./graph-collaborators.js";
export type { GraphCollaboratorsOptions } from "./graph-collaborators.js";
export {
  RoutingService,
  roadDistanceMessage,
  straightDistanceMessage,
} from "./routing-service.js";
