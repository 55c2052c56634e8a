import { NextFunction, Response } from 'express';
import { CrmRequest } from '../../types/request.types';
import { withStore } from '../../middlewares/database.middleware';
import { ResponseHandler } from '../../utils/response';
import { parseInput } from '../../utils/validation';
import * as customersService from './customers.service';
import { bulkCreateCustomersSchema } from './customers.validation';

export const createCustomer = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const { customer, message } = await withStore(req, store => customersService.createCustomer(store, req.body));
    return ResponseHandler.created(res, { customer }, message);
  } catch (error) {
    next(error);
  }
};

export const bulkCreateCustomers = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const { input } = parseInput(bulkCreateCustomersSchema, req.body);
    const result = await withStore(req, store => customersService.bulkCreateCustomers(store, input));
    return ResponseHandler.success(
      res,
      result,
      `Created ${result.customers.length} of ${input.length} customers`,
      result.customers.length > 0 ? 201 : 200
    );
  } catch (error) {
    next(error);
  }
};

export const getCustomers = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const { items, total, page, limit } = await withStore(req, store =>
      customersService.listCustomers(store, req.query)
    );
    return ResponseHandler.paginated(res, items, { page, limit, total });
  } catch (error) {
    next(error);
  }
};

export const getCustomerById = async (req: CrmRequest, res: Response, next: NextFunction) => {
  try {
    const customer = await withStore(req, store => customersService.getCustomer(store, req.params.id));
    return ResponseHandler.success(res, { customer });
  } catch (error) {
    next(error);
  }
};
