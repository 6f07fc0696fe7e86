export { FacilityIndex, categoryMatches, toFacilityTarget } from "./facility-index.js";
export type { FacilityMatch } from "./facility-index.js";
