export * from "./types/index";
export * from "./utils/index";
export * from "./validators/index";
export * from "./network/index";
