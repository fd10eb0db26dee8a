import { Router, Request, Response } from 'express';
import { calculateLoanSchedule } from '../../loan/calculate';
import { formatIssues, scheduleRequestSchema } from '../schemas';
import { handleRouteError } from '../errors';
import logger from '../../lib/logger';

const router = Router();

router.post('/', (req: Request, res: Response) => {
  const parsed = scheduleRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'Invalid request', issues: formatIssues(parsed.error) });
  }
  try {
    const { loan, specialPayments, recurringSpecialPayments } = parsed.data;
    const result = calculateLoanSchedule(loan, specialPayments, recurringSpecialPayments);
    logger.info(
      { loanType: loan.loanType, periods: result.summary.periods, payoffDate: result.summary.payoffDate },
      'Schedule calculated'
    );
    res.json({ data: result });
  } catch (err) {
    handleRouteError(err, res, 'POST /schedules');
  }
});

router.post('/summary', (req: Request, res: Response) => {
  const parsed = scheduleRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'Invalid request', issues: formatIssues(parsed.error) });
  }
  try {
    const { loan, specialPayments, recurringSpecialPayments } = parsed.data;
    const { summary, effectiveAnnualRate } = calculateLoanSchedule(loan, specialPayments, recurringSpecialPayments);
    res.json({ data: { ...summary, effectiveAnnualRate } });
  } catch (err) {
    handleRouteError(err, res, 'POST /schedules/summary');
  }
});

export default router;
