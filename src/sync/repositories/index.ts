export { BaseRepository, type RepositoryDeps } from './BaseRepository';
export { CabinetItemsRepository, USER_CABINETS_TABLE } from './CabinetItemsRepository';
export { DAILY_LOGS_TABLE, DailyLogsRepository, type CheckIn } from './DailyLogsRepository';
export { PROGRAM_ENROLLMENTS_TABLE, ProgramEnrollmentsRepository } from './ProgramEnrollmentsRepository';
export { PROGRESS_RECORDS_TABLE, ProgressRecordsRepository } from './ProgressRecordsRepository';
export {
  DEFAULT_NOTIFICATION_PREFERENCES,
  USER_PROFILES_TABLE,
  UserProfilesRepository,
  type QuizResult,
} from './UserProfilesRepository';
