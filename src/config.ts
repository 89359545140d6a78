const config = {
    networkName: 'EvoStake Devnet',
    allowedUsernameChars: 'abcdefghijklmnopqrstuvwxyz0123456789.-',
    usernameMinLength: 3,
    usernameMaxLength: 16,
    collectionSymbolAllowedChars: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ1234567890',
    collectionSymbolMinLength: 3,
    collectionSymbolMaxLength: 10,
    collectionNameMaxLength: 50,
    baseUriMaxLength: 2048,
    // Upper bound for any configured duration (100 years, in seconds)
    maxDuration: 3153600000,
    maxSupply: 1000000,
    maxPerMint: 100,
    maxTransferBatch: 100,
    maxValue: '999999999999999999999999999999',
    recentEventsLimit: 1000,
    // How far (seconds) a transaction timestamp may run ahead of the node clock
    maxDrift: 30,
};

export default config;
