export type { FontProgram } from "./base";
export { CFFCIDFontProgram, CFFType1FontProgram } from "./cff";
export { TrueTypeFontProgram } from "./truetype";
export { Type1FontProgram } from "./type1";
