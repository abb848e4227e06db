export const COMPILER_NAME = "proofgen";
export const COMPILER_VERSION = "0.1.0";
