/**
 * OS Module - Operating System Detection
 */

export { OSDetector } from './detector.js';
export { OperatingSystem } from '../types/common.js';
