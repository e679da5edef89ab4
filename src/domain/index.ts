/**
 * Domain Module
 *
 * Pure tournament logic shared by the engines, the synthesizer and the assembler.
 * Nothing under src/domain/ performs I/O or logs.
 */
export * from './playoff';
