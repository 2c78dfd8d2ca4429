import { loadBoosterConfig } from './config/booster.config';
import { CardDataService } from './services/CardDataService';
import { PackExportService } from './services/PackExportService';
import { PackGeneratorService } from './services/PackGeneratorService';

export const config = loadBoosterConfig();

export const cardDataService = new CardDataService(config.cardDataPath, config);
// Each call captures the snapshot current at that moment
export const packGeneratorService = new PackGeneratorService(() => cardDataService.getIndex(), config);
export const packExportService = new PackExportService();
