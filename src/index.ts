export * from "./types";
export * from "./errors";
export { config } from "./config";
export { toBits, fromBits, u32ToBits, bitsToU32 } from "./utils";
export * from "./dwt";
export * from "./selector";
export * from "./capacity";
export * from "./step-policy";
export * from "./qim";
export * from "./frame";
export * from "./engine";
export * from "./analysis";
export * from "./stego-image";
