export * from "./CaptureRecord";
export * from "./CaptureTagNormalizer";
export * from "./ExifService";
export * from "./ExifServiceExifTool";
