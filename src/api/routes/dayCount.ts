import { Router, Request, Response } from 'express';
import { dayCount } from '../../loan/dayCount';
import { dayCountQuerySchema, formatIssues } from '../schemas';
import { handleRouteError } from '../errors';

const router = Router();

// GET /api/day-count?convention=30E/360%20ISDA&start=2024-01-01&end=2024-07-01
router.get('/', (req: Request, res: Response) => {
  const parsed = dayCountQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    return res.status(400).json({ error: 'Invalid request', issues: formatIssues(parsed.error) });
  }
  try {
    const { convention, start, end, maturityDate } = parsed.data;
    res.json({ data: { convention, start, end, ...dayCount(convention, start, end, { maturityDate }) } });
  } catch (err) {
    handleRouteError(err, res, 'GET /day-count');
  }
});

export default router;
