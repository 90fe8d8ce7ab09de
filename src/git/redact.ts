const CREDENTIAL_RE = /^([a-z][a-z0-9+.-]*:\/\/)([^@/]+)@/i;

/** Hides userinfo in URL-style repository locations before they are logged. */
export const redactRepoUrl = (repo: string) =>
	repo.replace(CREDENTIAL_RE, (_match, scheme: string, userinfo: string) => {
		const separator = userinfo.indexOf(":");
		if (separator === -1) {
			return scheme.toLowerCase().startsWith("http")
				? `${scheme}***@`
				: `${scheme}${userinfo}@`;
		}
		return `${scheme}${userinfo.slice(0, separator)}:*****@`;
	});
