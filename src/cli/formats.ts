import { EXPORT_FORMATS, type ExportFormat } from "../pipeline/types";

export function parseFormats(value: string): ExportFormat[] {
  const out: ExportFormat[] = [];
  for (const name of value.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean)) {
    const format = EXPORT_FORMATS.find((f) => f === name);
    if (!format) {
      throw new Error(`Unknown export format "${name}". Expected one of: ${EXPORT_FORMATS.join(", ")}`);
    }
    if (!out.includes(format)) out.push(format);
  }
  return out;
}
