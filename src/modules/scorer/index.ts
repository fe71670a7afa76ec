const RATING_POINTS = 50;
const VOLUME_POINTS_CAP = 50;
const VOLUME_LOG_FACTOR = 8;

export class PerformanceScorer {

    /**
     * 0-100 blend of review quality and volume.
     * Rating contributes up to 50 points linearly; review volume up to 50
     * points on a log scale (the cap is hit around 520 reviews).
     */
    static score(rating: number, reviewCount: number): number {
        if (reviewCount <= 0) return 0;

        const ratingScore = (rating / 5.0) * RATING_POINTS;
        const volumeScore = Math.min(VOLUME_POINTS_CAP, Math.log(reviewCount) * VOLUME_LOG_FACTOR);

        return Math.round((ratingScore + volumeScore) * 100) / 100;
    }
}
