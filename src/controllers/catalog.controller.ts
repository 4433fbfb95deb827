import { Request, Response } from 'express';
import { CatalogService } from '../services/catalog.service';
import { Taxonomy } from '../types/taxonomy.types';
import { AppError, ErrorCode } from '../types/error.types';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Catalog Controller
 *
 * Taxonomy and image file endpoints
 */
export class CatalogController {
  constructor(
    private catalogService: CatalogService,
    private taxonomy: Taxonomy
  ) {}

  /**
   * GET /v1/taxonomy
   */
  getTaxonomy = asyncHandler(async (_req: Request, res: Response) => {
    res.status(200).json(
      createSuccessResponse({
        categories: this.taxonomy.categories,
        imageDirectory: this.catalogService.directory,
      })
    );
  });

  /**
   * GET /images/:filename
   */
  serveImage = asyncHandler(async (req: Request, res: Response) => {
    const filename = req.params['filename'] ?? '';
    const filePath = await this.catalogService.resolveImagePath(filename);

    if (!filePath) {
      throw new AppError(ErrorCode.IMAGE_NOT_FOUND, `Image ${filename} not found`, 404);
    }

    // resolveImagePath already confines the path; a dot segment above the
    // catalog directory must not hide its files
    await new Promise<void>((resolve, reject) => {
      res.sendFile(filePath, { dotfiles: 'allow' }, (err?: Error) => (err ? reject(err) : resolve()));
    });
  });
}
