export { registerExtractionRoutes } from './extractions';
export { registerExportRoutes } from './export';
