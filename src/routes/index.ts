import express from 'express';
import customersRoutes from '../modules/customers/customers.routes';
import productsRoutes from '../modules/products/products.routes';
import ordersRoutes from '../modules/orders/orders.routes';
import { ResponseHandler } from '../utils/response';

const router = express.Router();

router.get('/', (req, res) => {
  ResponseHandler.success(res, { hello: 'Hello, CRM!' });
});

// API Routes
router.use('/customers', customersRoutes);
router.use('/products', productsRoutes);
router.use('/orders', ordersRoutes);

export default router;
