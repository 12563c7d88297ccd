export const EXAMPLE_EXTENSIONS_MANIFEST = `# Plugins and themes managed by plugsmith.
#
# Each entry needs a name and exactly one source:
#   repo = "owner/name"          (hosted shorthand)
#   url  = "https://host/x.git"  (any git URL)
# and at most one of branch, tag or commit.

# [[plugins]]
# name = "issues_panel"
# repo = "example-org/issues_panel"
# tag = "v1.0.2"

# [[themes]]
# name = "minimal"
# url = "https://git.example.com/themes/minimal.git"
# branch = "main"
`
