import { parseEther } from "@ethersproject/units";

export const ONE_ETH = parseEther("1");
export const TENTH_ETH = parseEther("0.1");

export const SAMPLE_LINEAR_AUCTION = {
  timestampStart: 1000,
  timestampEnd: 2000,
  startPrice: ONE_ETH,
  basePrice: TENTH_ETH,
};

export const SAMPLE_EXPONENTIAL_AUCTION = {
  timestampStart: 1000,
  priceDecayHalfLifeSeconds: 100,
  startPrice: ONE_ETH,
  basePrice: TENTH_ETH,
};

export enum Errors {
  // ledger
  InsufficientFunds = "sender doesn't have enough funds to send tx",
  NoFallback = "function selector was not recognized and there's no fallback function",
  Reentrant = "ReentrancyGuard: reentrant call",
  NotOwner = "Ownable: caller is not the owner",
  // admin and registries
  OnlySuperAdmin = "Only superAdmin",
  OnlyAdminACL = "Only Admin ACL allowed",
  OnlyCoreAdminACL = "Only Core AdminACL allowed",
  OnlyArtistOrCoreAdminACL = "Only Artist or Core Admin ACL",
  OnlyRegisteredCore = "Only registered core contract",
  OnlyUnregisteredContracts = "Only unregistered contracts",
  OnlyRegisteredContracts = "Only registered contracts",
  MismatchedArrayLengths = "Mismatched array lengths",
  CoreNotRegistered = "Core not registered",
  // core
  OnlyArtistCore = "Only artist",
  MustMintFromMinter = "Must mint from minter contract",
  ExceedsCoreMaxInvocations = "Must not exceed max invocations",
  ProjectInactive = "Project must exist and be active",
  PurchasesPaused = "Purchases are paused.",
  // minter filter
  OnlyApprovedMinters = "Only approved minters",
  OnlyValidProjectId = "Only valid project ID",
  MinterAlreadyApproved = "Minter already approved",
  OnlyPreviouslyApproved = "Only previously approved minter",
  NoMinterAssigned = "No minter assigned",
  OnlyAssignedMinter = "Only assigned minter",
  CannotRenounce = "Cannot renounce ownership",
  ZeroAddress = "Must input non-zero address",
  // minters
  OnlyArtist = "Only Artist",
  OnlyMinterFilterAdminACL = "Only MinterFilter AdminACL",
  PriceNotConfigured = "Price not configured",
  MinValueToMint = "Min value to mint req.",
  MaxInvocationsReached = "Max invocations reached",
  AboveCoreMaxInvocations = "Only max invocations lte core max invocations",
  BelowCoreInvocations = "Only max invocations gte core invocations",
  // funds
  RefundFailed = "Refund failed",
  RenderProviderPaymentFailed = "Render Provider payment failed",
  AdditionalPayeePaymentFailed = "Additional Payee payment failed",
  ArtistPaymentFailed = "Artist payment failed",
  RevenueSplitsMismatch = "Revenue splits must sum to price",
  UnexpectedRevenueSplitBytes = "Unexpected revenue split bytes",
  OnlyERC20 = "null address, only ERC20",
  OnlyNonNullSymbol = "only non-null symbol",
  ERC20NotConfigured = "ERC20: payment not configured",
  ERC20TransferFailed = "ERC20 transfer failed",
  InsufficientAllowance = "Insufficient ERC20 allowance",
  InsufficientBalance = "Insufficient ERC20 balance",
  NoETHWithERC20 = "ERC20: No ETH when using ERC20",
  CurrencyMismatch = "Currency addresses must match",
  MaxPriceBelowPrice = "Only max price gte token price",
  // auctions
  OnlyConfiguredAuctions = "Only configured auctions",
  AuctionNotStarted = "Auction not yet started",
  NoModificationsMidAuction = "No modifications mid-auction",
  OnlyFutureAuctions = "Only future auctions",
  StartPriceAboveBasePrice = "Auction start price must be greater than base price",
  EndAfterStart = "Auction end must be greater than auction start",
  AuctionTooShort = "Auction length must be at least minimumAuctionLengthSeconds",
  HalfLifeOutOfRange = "Price decay half life must fall between min and max allowable values",
  MaxHalfLifeAboveMin = "Maximum half life must be greater than minimum",
  // holders and polyptych
  HolderArraysMismatch = "Holder arrays must be equal length",
  OnlyRegisteredNFTs = "Only registered core contract NFTs",
  OnlyAllowlistedNFTs = "Only allowlisted NFTs",
  OnlyOwnerOfNFT = "Only owner of NFT",
  MustClaimNFTOwnership = "Must claim NFT ownership",
  InvalidDelegateVaultPairing = "Invalid delegate-vault pairing",
  PanelAlreadyMinted = "Panel already minted",
  OnlyHashSeedSetter = "Only hashSeedSetterContract",
  HashSeedNotPreassigned = "Hash seed not preassigned",
  // merkle
  RootRequired = "Root must be provided",
  InvalidMerkleProof = "Invalid Merkle proof",
  InvalidMaxInvocationsPerAddress = "Invalid max invocations",
  MaxInvocationsPerAddressReached = "Maximum number of invocations per address reached",
}
