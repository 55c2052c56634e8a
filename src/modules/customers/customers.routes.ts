import express from 'express';
import * as customersController from './customers.controller';

const router = express.Router();

router.get('/', customersController.getCustomers);
router.get('/:id', customersController.getCustomerById);
router.post('/', customersController.createCustomer);
router.post('/bulk', customersController.bulkCreateCustomers);

export default router;
