export * from "./RawConverter";
export * from "./RawConverterDarktable";
export * from "./StyleCatalog";
export * from "./StyleCatalogDarktable";
