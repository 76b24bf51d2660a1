/** Naming convention of the IMSS guideline catalogue. */

// Comprehensive guideline ("Guía de Evidencias y Recomendaciones"): the download target.
export const COMPREHENSIVE_GUIDELINE_TOKEN = "GER";

// Quick-reference card ("Guía de Referencia Rápida"): never downloaded.
export const QUICK_REFERENCE_TOKEN = "GRR";

export const PDF_EXTENSION = ".pdf";

export const IDENTIFIER_PATTERN = /IMSS-\d+-\d+/i;

/** Case-insensitive suffix match on the file stem; `DiabetesGER` carries the token too. */
export function stemEndsWithToken(stem: string, token: string): boolean {
  return stem.toUpperCase().endsWith(token.toUpperCase());
}
