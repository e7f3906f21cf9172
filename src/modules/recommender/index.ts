import { AvailabilityResult, ValidationResult } from '../../types';

export class Recommender {

    /**
     * Registry conflicts outrank convention errors, which outrank warnings.
     */
    static recommend(availability: AvailabilityResult, validation: ValidationResult): string {
        if (!availability.available) {
            if (availability.exactMatches.length > 0) {
                return 'Name not available - exact match found in MCA database';
            }
            return `Name may be rejected - ${availability.similarMatches.length} similar companies found`;
        }

        if (!validation.isValid) {
            return `Name validation failed - ${validation.errors.length} naming convention errors`;
        }

        if (validation.warnings.length > 0) {
            return `Name available with minor issues - ${validation.warnings.length} warnings to consider`;
        }

        return 'Name appears available and compliant with MCA guidelines';
    }
}
