import mongoose, { Document, Schema } from 'mongoose';

import { UnitChoice } from '../types/ledger';

export interface ILedger extends Document {
  ledgerId: string;
  idempotencyKey: string;
  unit: UnitChoice;
  metadata?: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

const ledgerSchema = new Schema<ILedger>(
  {
    ledgerId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    // One ledger per subsidy: the key is derived from the subsidy id
    idempotencyKey: {
      type: String,
      required: true,
      unique: true,
    },
    unit: {
      type: String,
      required: true,
      enum: Object.values(UnitChoice),
      default: UnitChoice.USD_CENTS,
    },
    metadata: {
      type: Schema.Types.Mixed,
    },
  },
  {
    timestamps: true,
  }
);

export const Ledger = mongoose.model<ILedger>('Ledger', ledgerSchema);
