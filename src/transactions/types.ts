export enum TransactionType {
  // NFT Transactions
  NFT_MINT = 1,
  NFT_TRANSFER = 2,
  NFT_STAKE = 3,
  NFT_UNSTAKE = 4,

  // Collection administration
  COLLECTION_INITIALIZE = 10,
  COLLECTION_WITHDRAW = 11,
}

export const transactions: { [key: number]: string } = {
  [TransactionType.NFT_MINT]: 'nft_mint',
  [TransactionType.NFT_TRANSFER]: 'nft_transfer',
  [TransactionType.NFT_STAKE]: 'nft_stake',
  [TransactionType.NFT_UNSTAKE]: 'nft_unstake',
  [TransactionType.COLLECTION_INITIALIZE]: 'collection_initialize',
  [TransactionType.COLLECTION_WITHDRAW]: 'collection_withdraw',
};

/** Transaction payloads arrive as parsed JSON and are narrowed by each handler. */
export type TxPayload = Record<string, unknown>;
