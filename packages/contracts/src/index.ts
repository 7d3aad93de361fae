export * from "./random/fresh-seed";
export * from "./random/seeded-random";
export * from "./schemas/config";
export * from "./schemas/seed";
export * from "./types/error";
export * from "./types/result";
