import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Decimal } from 'decimal.js';
import pino from 'pino';
import { validate } from '../middleware/validation.js';
import { errorBody } from '../middleware/error-handler.js';
import { rateCalculator } from '../services/conversion/index.js';
import { currencyMetadata } from '../services/currency/currency-metadata.js';
import { CurrencyNotFoundError, InvalidAmountError } from '../utils/errors.js';

const log = pino({ name: 'convert' });
const router = Router();

function currencyCodeField(label: 'Source' | 'Destination') {
  const required = `${label} currency is required`;
  return z
    .string({ required_error: required, invalid_type_error: `${label} currency must be a string` })
    .trim()
    .min(1, required)
    .transform((code) => code.toUpperCase())
    .refine((code) => currencyMetadata.exists(code), {
      message: `Invalid ${label.toLowerCase()} currency code`,
    });
}

const DECIMAL_STRING = /^-?\d+(\.\d+)?$/;

const amountField = z
  .union(
    [
      z.number({ invalid_type_error: 'Source amount must be a number' }).finite('Source amount must be a number'),
      z
        .string()
        .trim()
        .regex(DECIMAL_STRING, 'Source amount must be a number'),
    ],
    {
      errorMap: (issue, ctx) =>
        issue.code === 'invalid_union' ? { message: 'Source amount must be a number' } : { message: ctx.defaultError },
    },
  )
  .optional()
  .superRefine((amount, ctx) => {
    if (amount === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Source amount is required' });
    } else if (new Decimal(amount).lt(0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Source amount cannot be negative' });
    }
  });

export const conversionRequestSchema = z.object({
  sourceCurrency: currencyCodeField('Source'),
  destinationCurrency: currencyCodeField('Destination'),
  sourceAmount: amountField,
});

export type ConversionRequest = z.infer<typeof conversionRequestSchema>;

/**
 * POST /api/v1/convert: Convert an amount between two currencies.
 *
 * Body: { sourceCurrency, destinationCurrency, sourceAmount }.
 * Rates come from the table valid right now; see RateCalculator for rounding.
 */
router.post('/', validate(conversionRequestSchema), async (req: Request, res: Response) => {
  const { sourceCurrency, destinationCurrency, sourceAmount }: ConversionRequest = req.body;

  try {
    // Decimal strings stay exact; only JSON numbers arrive as doubles
    const amount = new Decimal(sourceAmount ?? 0);
    const result = await rateCalculator.convert(sourceCurrency, destinationCurrency, amount);

    log.info(
      {
        ...res.locals.requestContext,
        sourceCurrency,
        destinationCurrency,
        exchangeRate: result.exchangeRate.toString(),
      },
      'Conversion completed',
    );

    return res.json({
      status: 'success',
      code: 200,
      data: {
        sourceCurrency,
        destinationCurrency,
        sourceAmount: amount.toNumber(),
        destinationAmount: result.destinationAmount.toNumber(),
        exchangeRate: result.exchangeRate.toNumber(),
      },
    });
  } catch (err) {
    if (err instanceof CurrencyNotFoundError) {
      log.warn({ ...res.locals.requestContext, code: err.currencyCode, role: err.role }, err.message);
      return res.status(404).json(errorBody(404, err.message));
    }
    if (err instanceof InvalidAmountError) {
      return res.status(422).json(errorBody(422, err.message));
    }

    log.error({ ...res.locals.requestContext, err }, 'Conversion failed');
    return res.status(500).json(errorBody(500, 'An unexpected error occurred'));
  }
});

export default router;
