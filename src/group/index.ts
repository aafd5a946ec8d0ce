export { GroupRegistry } from "./group-registry.js";
export type { GroupRegistryOptions } from "./group-registry.js";
export { GroupAccessor } from "./group-accessor.js";
export type { GroupAccessorOptions } from "./group-accessor.js";
export type { CreateGroupParams, Group, GroupReader } from "./types.js";
