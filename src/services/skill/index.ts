/**
 * Companion skill module exports.
 */

export {
  AGENT_HOMES,
  SKILL_NAME,
  SkillInstaller,
  type SkillInstallResult,
  type SkillTargetResult,
} from "./skill-installer.js";
