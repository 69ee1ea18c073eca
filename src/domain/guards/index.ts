export { GuardResult, notBlank, positive, matchesPattern, notAbsent, isAbsent } from './guards';
