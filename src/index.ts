export * from "./config";
export * from "./logger";

export * from "./chain/accounts";
export * from "./chain/contract";
export * from "./chain/errors";
export * from "./chain/ledger";
export * from "./chain/storage";

export * from "./contracts/interfaces/IAdminACL";
export * from "./contracts/interfaces/ICoreContract";
export * from "./contracts/interfaces/IDelegationRegistry";
export * from "./contracts/interfaces/IERC20";
export * from "./contracts/interfaces/IERC721";
export * from "./contracts/interfaces/IMinter";
export * from "./contracts/interfaces/IRandomizer";

export * from "./contracts/access/AdminACL";
export * from "./contracts/access/Ownable";
export * from "./contracts/core/BasicRandomizer";
export * from "./contracts/core/CoreRegistry";
export * from "./contracts/core/EngineCore";
export * from "./contracts/core/FlagshipCore";
export * from "./contracts/core/GenerativeCore";
export * from "./contracts/core/PolyptychRandomizer";
export * from "./contracts/minter-filter/MinterFilter";

export * from "./contracts/libs/Auth";
export * from "./contracts/libs/DutchAuction";
export * from "./contracts/libs/DutchAuctionExponential";
export * from "./contracts/libs/DutchAuctionLinear";
export * from "./contracts/libs/EngineDetectionCache";
export * from "./contracts/libs/FundsSplitter";
export * from "./contracts/libs/MaxInvocationsTracker";
export * from "./contracts/libs/MerkleAllowlist";
export * from "./contracts/libs/PolyptychPanels";
export * from "./contracts/libs/ProjectKey";
export * from "./contracts/libs/RevenueSplits";
export * from "./contracts/libs/SetPriceConfig";
export * from "./contracts/libs/TokenHolderAllowlist";

export * from "./contracts/minters/MinterBase";
export * from "./contracts/minters/MinterDAExponential";
export * from "./contracts/minters/MinterDALinear";
export * from "./contracts/minters/MinterSetPrice";
export * from "./contracts/minters/MinterSetPriceERC20";
export * from "./contracts/minters/MinterSetPriceHolder";
export * from "./contracts/minters/MinterSetPriceMerkle";
export * from "./contracts/minters/MinterSetPricePolyptych";
