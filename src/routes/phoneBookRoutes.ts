import express from 'express';
import { PhoneBookController } from '../controller/phoneBookController';

export function createPhoneBookRouter(controller: PhoneBookController) {
  const router = express.Router();

  router.get('/PhoneBook/list', controller.list);
  router.post('/PhoneBook/add', controller.add);
  router.put('/PhoneBook/deleteByName', controller.deleteByName);
  router.put('/PhoneBook/deleteByNumber', controller.deleteByNumber);

  return router;
}
