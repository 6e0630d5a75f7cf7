import { Router, type Request, type Response } from 'express';
import { logAndRespond } from '../core/logger';
import { listActiveProducts, listActiveServices } from '../core/catalogService';

const router = Router();

router.get('/api/services', async (req: Request, res: Response) => {
  try {
    const services = await listActiveServices();
    res.json({ services });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to fetch services', error);
  }
});

router.get('/api/products', async (req: Request, res: Response) => {
  try {
    const products = await listActiveProducts();
    res.json({
      products: products.map(product => ({
        ...product,
        rating: product.rating === null ? null : Number(product.rating),
      })),
    });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to fetch products', error);
  }
});

export default router;
