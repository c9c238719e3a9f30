import { z } from 'zod';

/** Ten years; keeps every due date inside four-digit years. */
export const MAX_LOAN_DAYS = 3650;

export const LoanDaysSchema = z
    .number()
    .int('loanDays must be a whole number')
    .positive('loanDays must be positive')
    .max(MAX_LOAN_DAYS, `loanDays must be at most ${MAX_LOAN_DAYS}`);
