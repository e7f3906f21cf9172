export class StringUtils {

    /**
     * "xyz tech labs" -> "Xyz Tech Labs".
     */
    static titleCase(text: string): string {
        return text.toLowerCase().replace(/\b[a-z]/g, (c) => c.toUpperCase());
    }
}
