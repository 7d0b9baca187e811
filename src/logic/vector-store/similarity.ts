import { SimilarityMetric } from '../../config/configuration';

export function dot(a: number[], b: number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

export function norm(a: number[]): number {
    return Math.sqrt(dot(a, a));
}

/**
 * Scores a stored vector against a query; higher is closer.
 * `storedNorm` is precomputed at load time.
 */
export function score(metric: SimilarityMetric, query: number[], queryNorm: number, stored: number[], storedNorm: number): number {
    const product = dot(query, stored);
    if (metric === 'inner_product') return product;
    return product / (queryNorm * storedNorm + 1e-8);
}
