// @telnet-relay/wire - Telnet byte-level protocol handling

export { TelnetCommand, isNegotiation, commandName } from "./commands.ts";
export {
  type FilterMode,
  type FilterState,
  createFilterState,
  filterTelnet,
  TelnetFilter,
} from "./filter.ts";
