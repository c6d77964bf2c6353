import { Router } from 'express';
import { BoardingRequestSchema } from '../schemas';
import { registerBoarding } from '../services/boarding';

const router = Router();

/**
 * POST /boarding
 * El cliente guarda `processed` y lo reenvía en cada llamada; la respuesta
 * trae el valor actualizado.
 */
router.post('/', async (req, res, next) => {
  try {
    const { processed, ...input } = BoardingRequestSchema.parse(req.body);
    const outcome = await registerBoarding(input, { processed });
    return res.json({
      code: 200,
      data: { registered: outcome.registered, processed: outcome.tally.processed },
    });
  } catch (err) {
    next(err);
  }
});

export default router;
