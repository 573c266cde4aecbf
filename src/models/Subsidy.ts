import mongoose, { Document, Schema } from 'mongoose';

import { SubsidyReferenceType, UnitChoice } from '../types/ledger';

export interface ISubsidy extends Document {
  subsidyId: string;
  title?: string | null;
  startingBalance: number;
  ledgerId: string;
  unit: UnitChoice;
  referenceId?: string | null;
  referenceType: SubsidyReferenceType;
  enterpriseCustomerUuid: string;
  internalOnly: boolean;
  activeDatetime?: Date | null;
  expirationDatetime?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const subsidySchema = new Schema<ISubsidy>(
  {
    subsidyId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    title: {
      type: String,
      trim: true,
      maxlength: 255,
      default: null,
    },
    startingBalance: {
      type: Number,
      required: true,
    },
    ledgerId: {
      type: String,
      required: true,
      unique: true,
    },
    unit: {
      type: String,
      required: true,
      enum: Object.values(UnitChoice),
      default: UnitChoice.USD_CENTS,
      index: true,
    },
    referenceId: {
      type: String,
      default: null,
    },
    referenceType: {
      type: String,
      required: true,
      enum: Object.values(SubsidyReferenceType),
      default: SubsidyReferenceType.OPPORTUNITY_PRODUCT_ID,
    },
    enterpriseCustomerUuid: {
      type: String,
      required: true,
      index: true,
    },
    internalOnly: {
      type: Boolean,
      default: false,
    },
    activeDatetime: {
      type: Date,
      default: null,
    },
    expirationDatetime: {
      type: Date,
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

export const Subsidy = mongoose.model<ISubsidy>('Subsidy', subsidySchema);
