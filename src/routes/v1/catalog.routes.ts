import { Router } from 'express';
import { CatalogController } from '../../controllers/catalog.controller';

/**
 * Taxonomy route (v1)
 */
export function createTaxonomyRouter(catalogController: CatalogController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/taxonomy:
   *   get:
   *     summary: Label categories and the image directory
   *     tags: [Catalog]
   *     responses:
   *       200:
   *         description: Taxonomy
   */
  router.get('/', catalogController.getTaxonomy);

  return router;
}

/**
 * Image files (unversioned, referenced from item views)
 */
export function createImagesRouter(catalogController: CatalogController): Router {
  const router = Router();

  /**
   * @swagger
   * /images/{filename}:
   *   get:
   *     summary: Image file for an item
   *     tags: [Catalog]
   *     parameters:
   *       - in: path
   *         name: filename
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Image bytes
   *       404:
   *         description: Image not found
   */
  router.get('/:filename', catalogController.serveImage);

  return router;
}
