import mongoose, { Schema } from 'mongoose';

export interface IToken {
  _id: number; // Token id
  owner: string;
  createdAt: number;
  autoStakeOnMint: boolean;
  lastTransferAt?: number;
  autoStakeOnTransfer: boolean;
}

const TokenSchema = new Schema<IToken>({
  _id: { type: Number, required: true },
  owner: { type: String, required: true, index: true },
  createdAt: { type: Number, required: true },
  autoStakeOnMint: { type: Boolean, default: false },
  lastTransferAt: { type: Number },
  autoStakeOnTransfer: { type: Boolean, default: false }
}, { versionKey: false });

export const TokenModel = mongoose.model<IToken>('Token', TokenSchema);

export default TokenModel;
