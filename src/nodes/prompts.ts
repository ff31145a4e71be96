export function titlePrompt(topic: string): string {
	return `
		You are an expert blog content writer. Use Markdown formatting.
		Generate a blog title for the topic "${topic}".
		The title should be creative and SEO friendly.
	`.replace(/\t/g, '').trim()
}

export function contentPrompt(topic: string): string {
	return `
		You are an expert blog writer. Use Markdown formatting.
		Generate detailed blog content, with a detailed breakdown, for the topic "${topic}".
	`.replace(/\t/g, '').trim()
}
