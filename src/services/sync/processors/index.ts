export { processHeritageSite } from "./heritage-sites.js";
export { processNaturalArea } from "./natural-areas.js";
export { processPlaza } from "./plazas.js";
export { processProvince } from "./provinces.js";
export { resolveHeritageCategory } from "./categories.js";
