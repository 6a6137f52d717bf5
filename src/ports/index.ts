export { type CapitalLedger, MemoryCapitalLedger, type MemoryCapitalLedgerConfig, type ShareReceipt } from "./capital-ledger.js";
export {
	type Credential,
	type CredentialIssuer,
	type CredentialRegistry,
	type CredentialRequest,
	MemoryCredentialIssuer,
	type MemoryCredentialIssuerConfig,
} from "./credential-issuer.js";
export { type ProvisionRequest, provisionFundedAccount } from "./provisioning.js";
