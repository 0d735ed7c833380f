// @vitalgate/asset-engine

export * from "./normalize";
export * from "./derive";
