import mongoose, { Schema } from 'mongoose';

export interface IStakeRecord {
  _id: number; // Token id
  isStaked: boolean;
  firstStakedAt?: number;
  lastStakedAt: number;
  accumulatedDuration: number;
}

const StakeRecordSchema = new Schema<IStakeRecord>({
  _id: { type: Number, required: true },
  isStaked: { type: Boolean, required: true, index: true },
  firstStakedAt: { type: Number },
  lastStakedAt: { type: Number, default: 0 },
  accumulatedDuration: { type: Number, default: 0 }
}, { versionKey: false });

export const StakeRecordModel = mongoose.model<IStakeRecord>('StakeRecord', StakeRecordSchema);

export default StakeRecordModel;
