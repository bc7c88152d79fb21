export * from "./governance-model";
