import type { WizardStep } from '../../../shared/constants/statuses';

export type WizardHandle = string;

export type WizardStatus = 'in_progress' | 'committed' | 'abandoned';

export interface SelectedService {
  serviceId: number;
  name: string;
  priceCents: number;
  durationMinutes: number;
}

export interface SelectedProduct {
  productId: number;
  name: string;
  unitPriceCents: number;
  quantity: number;
}

export interface SelectedSchedule {
  scheduledDate: string;
  scheduledTime: string;
  specialInstructions: string | null;
}

// Fields survive backward navigation; only an explicit setStepData overwrites them
export interface WizardSelections {
  service?: SelectedService;
  products?: SelectedProduct[];
  schedule?: SelectedSchedule;
}

export interface WizardTotals {
  servicePriceCents: number;
  productsTotalCents: number;
  totalPriceCents: number;
}

export interface WizardState {
  handle: WizardHandle;
  userId: number;
  status: WizardStatus;
  step: WizardStep;
  selections: WizardSelections;
  totals: WizardTotals;
  bookingId: number | null;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

export function computeTotals(selections: WizardSelections): WizardTotals {
  const servicePriceCents = selections.service?.priceCents ?? 0;
  const productsTotalCents = (selections.products ?? [])
    .reduce((sum, p) => sum + p.unitPriceCents * p.quantity, 0);
  return {
    servicePriceCents,
    productsTotalCents,
    totalPriceCents: servicePriceCents + productsTotalCents,
  };
}
