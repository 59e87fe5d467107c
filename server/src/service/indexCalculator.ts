import type {
  CalculationOutcome,
  CategoryContribution,
  PersonalIndexCalculation,
  RequestData,
  RequestIdentifier,
} from '../model/personalIndex';

const toAmount = (value: unknown): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : 0;

/**
 * Round half to even at the given number of decimal places.
 * Operates on the binary value, so 0.125 rounds to 0.12 and 0.375 to 0.38.
 */
export const roundHalfEven = (value: number, decimals = 2): number => {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (diff > 0.5) {
    rounded = floor + 1;
  } else if (diff < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }

  return rounded / factor;
};

const failed = (
  requestId: RequestIdentifier,
  totalSpent: number,
  failureReason: PersonalIndexCalculation['failureReason']
): PersonalIndexCalculation => ({
  outcome: { id: requestId, success: false },
  totalSpent,
  contributions: [],
  failureReason,
});

/**
 * Personal price index: Σ w_i * (P_i(t1) - P_i(t0)) / P_i(t0), as a percentage.
 *
 * w_i is the category's share of total spend, P_i(t1) its current spend and
 * P_i(t0) its base price. Categories without a positive base price and a
 * positive spend are skipped and their weight is not redistributed.
 */
export const calculatePersonalIndex = (
  requestId: RequestIdentifier,
  data: RequestData
): PersonalIndexCalculation => {
  const { categories } = data;
  if (!categories.length) {
    return failed(requestId, 0, 'NO_CATEGORIES');
  }

  const totalSpent = categories.reduce(
    (sum, category) => sum + toAmount(category.userSpent),
    0
  );
  if (totalSpent === 0) {
    return failed(requestId, totalSpent, 'ZERO_TOTAL_SPENT');
  }
  if (!Number.isFinite(totalSpent)) {
    return failed(requestId, totalSpent, 'NON_FINITE_RESULT');
  }

  let personalIndex = 0;
  const contributions: CategoryContribution[] = [];

  for (const category of categories) {
    const userSpent = toAmount(category.userSpent);
    const basePrice = toAmount(category.basePrice);
    if (basePrice <= 0 || userSpent <= 0) continue;

    const weight = userSpent / totalSpent;
    const change = (userSpent - basePrice) / basePrice;
    personalIndex += weight * change;
    contributions.push({ categoryId: category.id, weight, change });
  }

  if (!contributions.length) {
    return failed(requestId, totalSpent, 'NO_VALID_CATEGORIES');
  }

  const rounded = roundHalfEven(personalIndex * 100, 2);
  if (!Number.isFinite(rounded)) {
    return failed(requestId, totalSpent, 'NON_FINITE_RESULT');
  }

  return {
    outcome: {
      id: requestId,
      personalIndex: rounded,
      success: true,
    },
    totalSpent,
    contributions,
  };
};

export const computePersonalIndex = (
  requestId: RequestIdentifier,
  data: RequestData
): CalculationOutcome => calculatePersonalIndex(requestId, data).outcome;
