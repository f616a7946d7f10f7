export {
  buildEngineRecipients,
  engineRecipientsEqual,
  selectRecipients,
  type RecipientSelection,
} from './recipients.js';
export { formatMention, formatNotification } from './message.js';
