/** Compiler flags whose value is the following argument. */
export const COMPILER_FLAGS_WITH_VALUE: ReadonlySet<string> = new Set<string>([
	'-A',
	'-D',
	'-I',
	'-L',
	'-MF',
	'-MJ',
	'-MQ',
	'-MT',
	'-U',
	'-Xclang',
	'-Xlinker',
	'-Xpreprocessor',
	'-compatibility_version',
	'-current_version',
	'-idirafter',
	'-imacros',
	'-imultilib',
	'-include',
	'-include-pch',
	'-install_name',
	'-iprefix',
	'-iquote',
	'-isysroot',
	'-isystem',
	'-iwithprefix',
	'-iwithprefixbefore',
	'-l',
	'-mllvm',
	'-mthread-model',
	'-o',
	'-target',
	'-u',
	'-undefined',
	'-x',
	'-z',
])

/** Low-level linker flags whose value is the following argument. */
export const LINKER_FLAGS_WITH_VALUE: ReadonlySet<string> = new Set<string>([
	'-L',
	'-O',
	'-l',
	'-m',
	'-mllvm',
	'-o',
	'-y',
	'-z',
])
