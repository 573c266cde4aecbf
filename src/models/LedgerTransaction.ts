import mongoose, { Document, Schema } from 'mongoose';

import { TransactionState } from '../types/ledger';

export interface ILedgerTransaction extends Document {
  transactionId: string;
  ledgerId: string;
  idempotencyKey: string;
  quantity: number;
  state: TransactionState;
  referenceId?: string | null;
  referenceType?: string | null;
  lmsUserId?: number | null;
  contentKey?: string | null;
  subsidyAccessPolicyUuid?: string | null;
  metadata?: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

const ledgerTransactionSchema = new Schema<ILedgerTransaction>(
  {
    transactionId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    ledgerId: {
      type: String,
      required: true,
      index: true,
    },
    idempotencyKey: {
      type: String,
      required: true,
    },
    quantity: {
      type: Number,
      required: true,
      validate: {
        validator: Number.isInteger,
        message: 'quantity must be an integer number of minor units',
      },
    },
    state: {
      type: String,
      required: true,
      enum: Object.values(TransactionState),
      default: TransactionState.PENDING,
    },
    referenceId: {
      type: String,
      default: null,
    },
    referenceType: {
      type: String,
      default: null,
    },
    lmsUserId: {
      type: Number,
      default: null,
    },
    contentKey: {
      type: String,
      default: null,
    },
    subsidyAccessPolicyUuid: {
      type: String,
      default: null,
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

// Keys are scoped to their ledger; this index is the only guard against duplicate redemptions
ledgerTransactionSchema.index({ ledgerId: 1, idempotencyKey: 1 }, { unique: true });

// Redemption lookups and balance aggregation
ledgerTransactionSchema.index({ ledgerId: 1, lmsUserId: 1, contentKey: 1, state: 1 });
ledgerTransactionSchema.index({ ledgerId: 1, state: 1 });
ledgerTransactionSchema.index({ ledgerId: 1, createdAt: -1 });

export const LedgerTransaction = mongoose.model<ILedgerTransaction>(
  'LedgerTransaction',
  ledgerTransactionSchema
);
