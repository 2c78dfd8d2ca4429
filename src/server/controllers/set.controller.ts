import { Request, Response } from 'express';
import { sendError } from '../middleware/error.middleware';
import { cardDataService } from '../singletons';
import logger from '../utils/logger';

export class SetController {

  static getSets(_req: Request, res: Response) {
    try {
      res.json({ sets: cardDataService.getIndex().sets() });
    } catch (e) {
      sendError(res, e, 'Set listing error');
    }
  }

  static getSet(req: Request, res: Response) {
    try {
      const { metadata, sheets } = cardDataService.getIndex().lookup(req.params.code);
      res.json({
        ...metadata,
        sheets: {
          commons: sheets.commons.length,
          uncommons: sheets.uncommons.length,
          rares: sheets.rares.length,
          mythics: sheets.mythics.length,
          lands: sheets.lands.length,
          bonus: sheets.bonus.length,
          foils: sheets.foils.length
        }
      });
    } catch (e) {
      sendError(res, e, 'Set lookup error');
    }
  }

  static reload(_req: Request, res: Response) {
    try {
      const index = cardDataService.reload();
      logger.info(`[API] Card data reloaded: ${index.size} sets`);
      res.json({ sets: index.size, loadedAt: cardDataService.lastLoadedAt });
    } catch (e) {
      sendError(res, e, 'Reload error');
    }
  }
}
