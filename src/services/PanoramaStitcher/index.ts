export * from "./PanoramaNaming";
export * from "./PanoramaStitcher";
export * from "./PanoramaStitcherHugin";
