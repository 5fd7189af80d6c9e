import mongoose, { Document, Schema } from 'mongoose';

export interface ISubnetInfo extends Document {
  netuid: string;
  name: string;
  symbol: string;
  last_updated: string | null;
}

const SubnetInfoSchema = new Schema({
  netuid: {
    type: String,
    required: true,
    unique: true,
    index: true
  },
  name: { type: String, required: true },
  symbol: { type: String, required: true },
  last_updated: { type: String, default: null }
}, {
  collection: 'subnets',
  versionKey: false
});

export const SubnetInfoModel = mongoose.model<ISubnetInfo>('SubnetInfo', SubnetInfoSchema);
