/**
 * Ports - boundaries between the simulation core and external collaborators.
 *
 * ┌────────────────────────────────────────────────────────────────┐
 * │ ResponseGenerator - persona text generation (LLM, scripted)    │
 * │ ResponseRouter    - member question routing (LLM, scripted)    │
 * └────────────────────────────────────────────────────────────────┘
 */

export type { ResponseGenerator, ResponseRouter, Collaborators } from './collaborators.js';
