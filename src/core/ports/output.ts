/**
 * Output Port Interface
 * 
 * Defines the contract for all user-facing output operations.
 * Commands use this interface instead of console.log directly.
 * 
 * Implementations:
 *   - consoleOutput (default/CI): routes to plain console.log
 */

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;
}
