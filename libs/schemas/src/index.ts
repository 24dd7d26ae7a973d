export * from "./common/scalars";
export * from "./nut/endpoint";
export * from "./nut/ups";
export * from "./domain/usage";
