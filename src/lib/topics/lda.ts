// ---------------------------------------------------------------------------
// Latent Dirichlet Allocation — collapsed Gibbs sampling
// ---------------------------------------------------------------------------

export interface LdaOptions {
	numTopics: number;
	/** Each pass is `SWEEPS_PER_PASS` full Gibbs sweeps over the corpus */
	passes: number;
	/** Symmetric document-topic prior; defaults to 1 / numTopics */
	alpha?: number;
	/** Symmetric topic-word prior; defaults to 1 / numTopics */
	eta?: number;
	seed?: number;
}

export interface TopicTerm {
	word: string;
	probability: number;
}

export interface LdaModel {
	vocabulary: string[];
	/** topicWord[k][w] = p(word w | topic k) */
	topicWord: number[][];
	topTerms(topic: number, count: number): TopicTerm[];
}

const SWEEPS_PER_PASS = 20;
const DEFAULT_SEED = 0x5eed;

/** mulberry32 seeded PRNG */
export function createRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * Fit LDA over tokenised documents.
 */
export function fitLda(documents: string[][], options: LdaOptions): LdaModel {
	const K = options.numTopics;
	if (!Number.isInteger(K) || K < 1) {
		throw new RangeError(`numTopics must be a positive integer, got ${K}`);
	}
	const alpha = options.alpha ?? 1 / K;
	const eta = options.eta ?? 1 / K;
	const random = createRandom(options.seed ?? DEFAULT_SEED);

	const vocabulary: string[] = [];
	const wordIds = new Map<string, number>();
	const docs = documents.map((doc) =>
		doc.map((word) => {
			let id = wordIds.get(word);
			if (id === undefined) {
				id = vocabulary.length;
				wordIds.set(word, id);
				vocabulary.push(word);
			}
			return id;
		}),
	);
	const V = vocabulary.length;

	const wordTopic = Array.from({ length: V }, () => new Array<number>(K).fill(0));
	const topicTotals = new Array<number>(K).fill(0);
	const docTopic = docs.map(() => new Array<number>(K).fill(0));
	const assignments = docs.map((doc) => new Array<number>(doc.length).fill(0));

	docs.forEach((doc, d) => {
		doc.forEach((w, i) => {
			const k = Math.floor(random() * K);
			assignments[d][i] = k;
			wordTopic[w][k] += 1;
			topicTotals[k] += 1;
			docTopic[d][k] += 1;
		});
	});

	const weights = new Array<number>(K).fill(0);
	const sweeps = options.passes * SWEEPS_PER_PASS;
	for (let sweep = 0; sweep < sweeps; sweep++) {
		docs.forEach((doc, d) => {
			doc.forEach((w, i) => {
				const old = assignments[d][i];
				wordTopic[w][old] -= 1;
				topicTotals[old] -= 1;
				docTopic[d][old] -= 1;

				let total = 0;
				for (let k = 0; k < K; k++) {
					total +=
						((wordTopic[w][k] + eta) / (topicTotals[k] + V * eta)) * (docTopic[d][k] + alpha);
					weights[k] = total;
				}
				const target = random() * total;
				let next = 0;
				while (next < K - 1 && weights[next] <= target) next++;

				assignments[d][i] = next;
				wordTopic[w][next] += 1;
				topicTotals[next] += 1;
				docTopic[d][next] += 1;
			});
		});
	}

	const topicWord = Array.from({ length: K }, (_, k) =>
		vocabulary.map((_, w) => (wordTopic[w][k] + eta) / (topicTotals[k] + V * eta)),
	);

	return {
		vocabulary,
		topicWord,
		topTerms(topic, count) {
			const row = topicWord[topic] ?? [];
			return row
				.map((probability, w) => ({ word: vocabulary[w], probability, w }))
				.sort((a, b) => b.probability - a.probability || a.w - b.w)
				.slice(0, count)
				.map(({ word, probability }) => ({ word, probability }));
		},
	};
}

/** Render topic terms as `0.123*"word" + 0.045*"other"`. */
export function formatTopicTerms(terms: TopicTerm[]): string {
	return terms.map((t) => `${t.probability.toFixed(3)}*"${t.word}"`).join(" + ");
}
