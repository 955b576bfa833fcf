export { formatRoute, summarizeRoute } from "./route-format.js";
export { formatRouteText, formatRouteReport, writeRouteFile } from "./route-text.js";
