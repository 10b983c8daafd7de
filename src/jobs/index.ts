export {
  buildJob,
  runJob,
  exitCodeFor,
  EXIT_OK,
  EXIT_ERRORS,
  EXIT_ABORTED,
  type JobContext,
  type RunJobOptions,
  type RunOutcome,
} from './runner.js';

export {
  TrelloBoardDestination,
  toDestinationCard,
  type TrelloBoardDestinationOptions,
} from './trello-destination.js';

export {
  SlackChannelSource,
  SLACK_TO_TRELLO_JOB,
  messageToRecords,
  slackTsToIso,
  dateToSlackTs,
  type SlackChannelSourceOptions,
} from './slack-to-trello.js';

export {
  MirrorCardsSource,
  MIRROR_CARDS_JOB,
  MIRROR_COMMENT,
  checklistCompletion,
  qualifiesForMirror,
  mirrorDescription,
  toMirrorRecord,
  type MirrorSourceOptions,
} from './mirror-cards.js';

export {
  CardMaintenanceJob,
  CARD_MAINTENANCE_JOB,
  nextMonday,
  isOverdueBy,
  hasCompletedLabel,
  findCompletedList,
  type CardMaintenanceOptions,
} from './card-maintenance.js';
