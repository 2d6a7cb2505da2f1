/**
 * Path Advisor module exports.
 */

export { PathAdvisor, isOnPath, type PathAdvice } from "./path-advisor.js";
