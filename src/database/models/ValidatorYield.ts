/**
 * Mongoose model for per-validator yield documents
 */

import mongoose, { Document, Schema } from 'mongoose';

export interface IValidatorYield extends Document {
  id: number | null;
  hotkey: string;
  coldkey: string;
  take: string;
  verified: boolean;
  name: string;
  logo: string | null;
  url: string | null;
  description: string;
  verifiedBadge: boolean;
  twitter: string | null;
  last_updated: string | null;
  // netuid -> stored subnet record; written field by field with $set
  subnetsData: Record<string, unknown>;
}

const ValidatorYieldSchema = new Schema({
  id: {
    type: Number,
    default: null
  },
  hotkey: {
    type: String,
    required: true,
    unique: true,
    index: true
  },
  coldkey: {
    type: String,
    default: ''
  },
  take: {
    type: String,
    default: '0.0'
  },
  verified: {
    type: Boolean,
    default: false
  },
  name: { type: String },
  logo: { type: String, default: null },
  url: { type: String, default: null },
  description: { type: String },
  verifiedBadge: {
    type: Boolean,
    default: false
  },
  twitter: { type: String, default: null },
  last_updated: { type: String, default: null },
  subnetsData: {
    type: Schema.Types.Mixed,
    default: {}
  }
}, {
  collection: 'yield',
  // `id` is a stored field here, not the ObjectId virtual
  id: false,
  versionKey: false,
  minimize: false
});

export const ValidatorYield = mongoose.model<IValidatorYield>('ValidatorYield', ValidatorYieldSchema);
