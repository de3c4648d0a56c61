import { Router } from 'express';
import { streamTicksCtrl } from '../controllers/stream.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';

export const stream = Router();
stream.get('/stream/ticks', asyncHandler(streamTicksCtrl));
