export const rawExtensions = [
  ".nef",
  ".arw",
  ".cr2",
  ".cr3",
  ".dng",
  ".orf",
  ".rw2",
  ".raf",
  ".raw",
] as const;

/** 判斷兩張相片是否為同一組連拍時比對的拍攝參數 */
export const captureSettingKeys = [
  "FNumber",
  "ExposureTime",
  "ISO",
  "RecommendedExposureIndex",
  "SensitivityType",
  "ExposureProgram",
  "ExposureMode",
  "ExposureCompensation",
  "MeteringMode",
  "LightSource",
  "Flash",
  "FocalLength",
  "MaxApertureValue",
  "SensingMethod",
  "WhiteBalance",
  "SceneCaptureType",
  "GainControl",
  "Contrast",
  "Saturation",
  "Sharpness",
] as const;

export type CaptureSettingKey = (typeof captureSettingKeys)[number];

/** 其他工具（如 exiv2）的欄位名稱對應到 exiftool 的名稱 */
export const captureSettingAliases: Record<string, CaptureSettingKey> = {
  ISOSpeedRatings: "ISO",
  PhotographicSensitivity: "ISO",
  ExposureBiasValue: "ExposureCompensation",
};

export const captureTimeKey = "DateTimeOriginal";

/** 相鄰兩張相片最多相隔幾秒仍視為同一組連拍 */
export const defaultGapSeconds = 4;

/** Hugin pano_modify 的投影，索引即 --projection 的值 */
export const projections = [
  "rectilinear",
  "circular",
  "equirectangular",
  "fisheye_ff",
  "stereographic",
  "mercator",
  "trans_mercator",
  "sinusoidal",
  "lambert_equal_area_conic",
  "lambert_azimuthal",
  "albers_equal_area_conic",
  "miller_cylindrical",
  "panini",
  "architectural",
  "orthographic",
  "equisolid",
  "equi_panini",
  "biplane",
  "triplane",
  "panini_general",
  "thoby",
  "hammer",
] as const;

export type Projection = (typeof projections)[number];
