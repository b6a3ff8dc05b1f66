export * from "./navigator"
export * from "./navigator-store"
export * from "./settings"
