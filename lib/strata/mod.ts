export * from "./accessors.ts";
export * from "./errors.ts";
export * from "./flags.ts";
export * from "./key-spec.ts";
export * from "./load.ts";
export * from "./load-events.ts";
export * from "./node-list.ts";
export { type Args, Node, type ParentLink } from "./node.ts";
export * from "./reply.ts";
export * from "./resolve.ts";
export * from "./serialize.ts";
export * from "./settings.ts";
export * from "./template.ts";
export * from "./value.ts";
export {
  interpolate,
  type InterpolateOptions,
  interpolateOptionsSchema,
  type InterpolationFunction,
  type InterpolationFunctionRegistry,
  type MissingValueStrategy,
} from "../universal/interpolate.ts";
export { type EventBus, eventBus } from "../universal/event-bus.ts";
