import express from 'express';
import * as ordersController from './orders.controller';

const router = express.Router();

router.get('/', ordersController.getOrders);
router.get('/:id', ordersController.getOrderById);
router.post('/', ordersController.createOrder);

export default router;
