export {
  MAX_MATERIAL_ID,
  DEFAULT_MATERIAL_SETTINGS,
  materialSettingsSchema,
  createDefaultMaterialPalette,
  parseMaterialSettings,
  parseMaterialSettingsMap,
  getMaterialSettings,
  changedMaterialIds,
  type MaterialSettingsInput,
} from "./MaterialSettings.js";
