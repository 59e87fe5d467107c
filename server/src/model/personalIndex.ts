export type RequestIdentifier = string;

export interface CategoryRecord {
  id: string | number | null;
  userSpent: number;
  basePrice: number;
}

export interface RequestData {
  categories: CategoryRecord[];
  comparisonDate: string | null;
}

export interface CalculationOutcome {
  id: RequestIdentifier;
  personalIndex?: number;
  success: boolean;
}

export type CalculationFailureReason =
  | 'NO_CATEGORIES'
  | 'ZERO_TOTAL_SPENT'
  | 'NO_VALID_CATEGORIES'
  | 'NON_FINITE_RESULT';

export interface CategoryContribution {
  categoryId: CategoryRecord['id'];
  weight: number;
  change: number;
}

export interface PersonalIndexCalculation {
  outcome: CalculationOutcome;
  totalSpent: number;
  contributions: CategoryContribution[];
  failureReason?: CalculationFailureReason;
}

export type PersonalIndexTaskStatus =
  | 'QUEUED'
  | 'RUNNING'
  | 'COMPLETED'
  | 'FAILED'
  | 'CANCELLED';

export type ResultDeliveryStatus =
  | 'PENDING'
  | 'DELIVERED'
  | 'FAILED'
  | 'SKIPPED';

export interface PersonalIndexTaskSnapshot {
  taskId: string;
  requestId: RequestIdentifier;
  status: PersonalIndexTaskStatus;
  delivery: ResultDeliveryStatus;
  submittedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  outcome?: CalculationOutcome;
  error?: string;
}

export type PersonalIndexTaskUpdate = Partial<
  Omit<PersonalIndexTaskSnapshot, 'taskId' | 'requestId' | 'submittedAt'>
>;

export interface PersonalIndexTaskStore {
  enqueue(requestId: RequestIdentifier): PersonalIndexTaskSnapshot;
  update(taskId: string, update: PersonalIndexTaskUpdate): void;
  get(taskId: string): PersonalIndexTaskSnapshot | null;
  listByStatus(status: PersonalIndexTaskStatus): PersonalIndexTaskSnapshot[];
}

export type FetchRequestData = (
  requestId: RequestIdentifier
) => Promise<RequestData>;

export type ReportResult = (outcome: CalculationOutcome) => Promise<void>;
