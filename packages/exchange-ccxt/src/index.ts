export {
	CcxtExchangeClient,
	SUPPORTED_VENUES,
	createCcxtVenue,
} from "./CcxtExchangeClient";
export type { CcxtOrder, CcxtPosition, CcxtVenue } from "./CcxtExchangeClient";
export { classifyCcxtError } from "./errors";
