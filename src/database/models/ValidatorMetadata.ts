/**
 * Mongoose model for validator identity metadata synced from the chain
 */

import mongoose, { Document, Schema } from 'mongoose';

export interface IValidatorMetadata extends Document {
  hotkey: string;
  coldkey: string;
  take: string;
  verified: boolean;
  name: string | null;
  logo: string | null;
  url: string | null;
  description: string | null;
  verifiedBadge: boolean;
  twitter: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const ValidatorMetadataSchema = new Schema({
  hotkey: {
    type: String,
    required: true,
    unique: true,
    index: true
  },
  coldkey: {
    type: String,
    required: true,
    index: true
  },
  take: {
    type: String,
    default: '0.0000000000000000'
  },
  verified: { type: Boolean, default: false },
  name: { type: String, default: null },
  logo: { type: String, default: null },
  url: { type: String, default: null },
  description: { type: String, default: null },
  verifiedBadge: { type: Boolean, default: false },
  twitter: { type: String, default: null }
}, {
  collection: 'validator_metadata',
  timestamps: true,
  versionKey: false
});

export const ValidatorMetadataModel = mongoose.model<IValidatorMetadata>('ValidatorMetadata', ValidatorMetadataSchema);
