/**
 * Router Exports
 */

export { bucketsRouter } from "./buckets";
