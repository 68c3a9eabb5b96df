export const APP_CONFIG = Symbol("APP_CONFIG");
export const METADATA_SOURCE = Symbol("METADATA_SOURCE");
