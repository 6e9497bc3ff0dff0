import { LabConfig } from "../../schemas/config.js";

/** Contents written by `worldlab init`: every default spelled out. */
export const templateConfig = `${JSON.stringify(LabConfig.parse({ curiosity: {}, playback: {} }), null, 2)}\n`;
