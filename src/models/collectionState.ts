import mongoose, { Schema } from 'mongoose';

export interface IPayout {
  account: string;
  amount: string; // Padded amount, see toDbString
}

export interface ICollectionState {
  _id: number;
  admin: string;
  config?: Record<string, unknown>; // Serialized collection configuration, absent until initialized
  treasuryBalance: string;
  payouts: IPayout[];
  lastSeenTime: number;
}

const PayoutSchema = new Schema<IPayout>({
  account: { type: String, required: true },
  amount: { type: String, required: true }
}, { _id: false });

const CollectionStateSchema = new Schema<ICollectionState>({
  _id: { type: Number, required: true },
  admin: { type: String, required: true },
  config: { type: Schema.Types.Mixed },
  treasuryBalance: { type: String, default: '0' },
  payouts: { type: [PayoutSchema], default: [] },
  lastSeenTime: { type: Number, default: 0 }
}, { versionKey: false });

export const CollectionStateModel = mongoose.model<ICollectionState>('CollectionState', CollectionStateSchema);

export default CollectionStateModel;
