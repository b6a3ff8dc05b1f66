export * from "./collections"
export * from "./errors"
export * from "./history"
export * from "./navigator"
export * from "./settings"
