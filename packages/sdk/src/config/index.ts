export {
  attributionConfigSchema,
  DEFAULT_TESTED_FUNCTIONS,
  type AttributionConfig,
} from "./attribution";
export {
  reachabilityExceptionSchema,
  DEFAULT_REACHABILITY_EXCEPTIONS,
  type ReachabilityException,
} from "./exceptions";
export { namingConventionSchema, type NamingConvention } from "./naming";
