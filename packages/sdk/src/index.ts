export * from "./config/index";
export { buildConfigJsonSchema } from "./schema/json-schema";
