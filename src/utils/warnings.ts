/**
 * Non-fatal conditions reported while normalizing a flowsheet
 */

/**
 * Warns that a heat-integration group could not be merged into a single
 * exchanger unit and was left in its expanded form.
 */
export function warnUnmergedHeatIntegration(group: number, reason: string): void {
  console.warn(
    `SFILES: heat-integration group ${group} left unmerged: ${reason}. ` +
    'The expanded sub-node form is encoded instead.'
  );
}
