export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./host.js";
export * from "./interpolate.js";
export * from "./reactive/observable.js";
export * from "./reactive/scheduler.js";
export * from "./projection/transform.js";
export * from "./projection/project.js";
export * from "./view/limits.js";
export * from "./view/pixelSpace.js";
export * from "./ticks/ticks.js";
export * from "./ticks/format.js";
export * from "./grid/sampler.js";
export * from "./labels/padding.js";
export * from "./labels/overlap.js";
export * from "./axis/engine.js";
export * from "./axis/options.js";
export * from "./axis/layers.js";
export * from "./axis/style.js";
export * from "./axis/geoAxis.js";
export * from "./data/coastlines.js";
export * from "./data/conversions.js";
export * from "./data/mesh.js";
