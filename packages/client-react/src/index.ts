export {
  ConversationSearchProvider,
  useConversationSearchController,
  useConversationSearchResults,
  useConversationSearchState,
  useSearchResultSelection
} from "./search/ConversationSearchProvider";

export type { ConversationSearchProviderProps } from "./search/ConversationSearchProvider";
