import { NextFunction, Response } from 'express';
import { CrmRequest } from '../../types/request.types';
import { withStore } from '../../middlewares/database.middleware';
import { ResponseHandler } from '../../utils/response';
import * as ordersService from './orders.service';

export const createOrder = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const order = await withStore(req, store => ordersService.createOrder(store, req.body));
    return ResponseHandler.created(res, { order }, 'Order created successfully!');
  } catch (error) {
    next(error);
  }
};

export const getOrders = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const { items, total, page, limit } = await withStore(req, store =>
      ordersService.listOrders(store, req.query)
    );
    return ResponseHandler.paginated(res, items, { page, limit, total });
  } catch (error) {
    next(error);
  }
};

export const getOrderById = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const order = await withStore(req, store => ordersService.getOrder(store, req.params.id));
    return ResponseHandler.success(res, { order });
  } catch (error) {
    next(error);
  }
};
