export { tableToCsv, recordsToCsv, escapeCsvField } from './csv.js';
export { htmlExport } from './html.js';
