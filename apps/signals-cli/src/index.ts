export * from "./cliArgs";
export { main } from "./main";
