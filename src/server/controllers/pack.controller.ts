import { Request, Response } from 'express';
import { sendError } from '../middleware/error.middleware';
import { packExportService, packGeneratorService } from '../singletons';
import { optionalCount, readBody, readGenerationOptions, requireString } from './request.utils';
import { PackResult } from '../interfaces/BoosterInterfaces';

const withSummary = (pack: PackResult) => ({ ...pack, summary: packExportService.summarize(pack) });

export class PackController {

  static generate(req: Request, res: Response) {
    try {
      const body = readBody(req.body);
      const selector = requireString(body, 'set');
      const count = optionalCount(body, 'count', 1);
      const options = readGenerationOptions(body);

      const packs = count === 1
        ? [packGeneratorService.generatePack(selector, options)]
        : packGeneratorService.generateBatch(selector, count, options);

      if (req.query.format === 'arena') {
        res.type('text/plain').send(packs.map(p => packExportService.toArena(p)).join('\n\n'));
        return;
      }
      res.json({ packs: packs.map(withSummary) });
    } catch (e) {
      sendError(res, e, 'Generation error');
    }
  }

  static sealed(req: Request, res: Response) {
    try {
      const body = readBody(req.body);
      const selector = requireString(body, 'set');
      const packs = packGeneratorService.generateSealed(selector, readGenerationOptions(body));
      res.json({ packs: packs.map(withSummary), pool: packExportService.toDeckJson(packs) });
    } catch (e) {
      sendError(res, e, 'Sealed generation error');
    }
  }

  static chaos(req: Request, res: Response) {
    try {
      const packs = packGeneratorService.generateChaos(readGenerationOptions(readBody(req.body)));
      res.json({ packs: packs.map(withSummary), pool: packExportService.toDeckJson(packs) });
    } catch (e) {
      sendError(res, e, 'Chaos generation error');
    }
  }
}
