import Handlebars from 'handlebars';

export default class TemplateUtils {
    public static registerHelpers() {

        // right-aligned ranking label, e.g. "{{place @index}}" => " 1st"
        Handlebars.registerHelper("place", function(index: number) {
            return TemplateUtils.rankLabel(index + 1).padStart(4);
        });
    }

    public static rankLabel(position: number): string {
        switch (position) {
            case 1:
                return '1st';
            case 2:
                return '2nd';
            case 3:
                return '3rd';
            default:
                return `${position}th`;
        }
    }
}
