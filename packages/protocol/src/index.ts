export {
  REQUIRED_FIELDS,
  missingFields,
  stampMessage,
  type Message,
  type MessageDocument,
  type RequiredField,
} from "./messages.js";

export { PayloadError, encodeMessage, decodePayload } from "./wire.js";
