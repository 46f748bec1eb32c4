export {
  CommandDispatcher,
  lookupHypothesis,
  traverseHypothesis,
  pathHypothesis,
} from './dispatcher.js';

export {
  parseCommand,
  unquote,
  COMMAND_HELP,
  type Command,
} from './grammar.js';
