export * from "./types.js";
export * from "./logger.js";
export * from "./config/env.js";
export * from "./config/settings.js";
export * from "./graph/types.js";
export * from "./graph/errors.js";
export * from "./graph/model.js";
export * from "./graph/random.js";
export * from "./graph/generator.js";
export * from "./graph/minHeap.js";
export * from "./graph/dijkstra.js";
export * from "./graph/cache.js";
export * from "./graph/metrics.js";
export * from "./viz/dot.js";
