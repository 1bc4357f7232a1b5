export * from "./orderBuilder";
