export * from "./users";
export * from "./sessions";
export * from "./recycling-centers";
export * from "./devices";
export * from "./user-credits";
export * from "./pickups";
export * from "./challenges";
export * from "./challenge-completions";
export * from "./collector-nominations";
