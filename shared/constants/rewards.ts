export const POINT_REASONS = [
  'welcome_bonus',
  'booking_confirmed',
  'service_completed',
  'redemption',
  'booking_cancelled'
] as const;

export type PointReason = typeof POINT_REASONS[number];

export const WELCOME_BONUS_SEEDS = 500;
export const BOOKING_CONFIRMED_SEEDS = 25;
export const SERVICE_COMPLETED_SEEDS = 100;

export type RedemptionEffect = 'discount' | 'free_product' | 'status_upgrade';

export interface RedemptionOption {
  id: string;
  name: string;
  cost: number;
  effect: RedemptionEffect;
  description: string;
}

export const REDEMPTION_OPTIONS: readonly RedemptionOption[] = [
  {
    id: 'discount_10',
    name: '$10 Off',
    cost: 100,
    effect: 'discount',
    description: '$10 off your next lawn service',
  },
  {
    id: 'discount_25',
    name: '$25 Off',
    cost: 250,
    effect: 'discount',
    description: '$25 off your next lawn service',
  },
  {
    id: 'free_fertilizer',
    name: 'Free Organic Fertilizer',
    cost: 400,
    effect: 'free_product',
    description: 'A 50lb bag of organic fertilizer delivered with your next visit',
  },
  {
    id: 'gold_member',
    name: 'Gold Member Status',
    cost: 1000,
    effect: 'status_upgrade',
    description: 'Priority scheduling for a full season',
  },
];

export function findRedemptionOption(id: string): RedemptionOption | undefined {
  return REDEMPTION_OPTIONS.find(option => option.id === id);
}
