import { NextFunction, Response } from 'express';
import { CrmRequest } from '../../types/request.types';
import { withStore } from '../../middlewares/database.middleware';
import { ResponseHandler } from '../../utils/response';
import * as productsService from './products.service';

export const createProduct = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const product = await withStore(req, store => productsService.createProduct(store, req.body));
    return ResponseHandler.created(res, { product }, 'Product created successfully!');
  } catch (error) {
    next(error);
  }
};

export const getProducts = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const { items, total, page, limit } = await withStore(req, store =>
      productsService.listProducts(store, req.query)
    );
    return ResponseHandler.paginated(res, items, { page, limit, total });
  } catch (error) {
    next(error);
  }
};

export const getProductById = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const product = await withStore(req, store => productsService.getProduct(store, req.params.id));
    return ResponseHandler.success(res, { product });
  } catch (error) {
    next(error);
  }
};
