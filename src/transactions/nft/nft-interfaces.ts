export interface NFTMintData {
    to: string;
    quantity: number;
    payment: bigint;
}

export interface NFTTransferData {
    to: string;
    tokenId: number;
    quantity: number;
    memo?: string;
}

export interface NFTStakeData {
    tokenId: number;
}

export type NFTUnstakeData = NFTStakeData;
