// src/cli/completion/renderers.ts - Shell script templates
//
// Every script defers candidate lookup to the program itself through the
// hidden __complete command, so the scripts stay the same as commands are
// added. Candidates come back one per line as "name<TAB>description".

import type { OutputSink } from '../../core/types/output-sink.js';
import { COMPLETE_COMMAND, COMPLETE_NO_DESC_COMMAND } from './types.js';

function functionName(programName: string): string {
  return programName.replace(/[^A-Za-z0-9_]/g, '_');
}

export function renderBash(programName: string, out: OutputSink): void {
  out.write(`# bash completion for ${programName}

__${functionName(programName)}_debug()
{
    if [[ -n \${BASH_COMP_DEBUG_FILE-} ]]; then
        echo "$*" >> "\${BASH_COMP_DEBUG_FILE}"
    fi
}

__start_${programName}()
{
    local cur first out
    COMPREPLY=()
    cur="\${COMP_WORDS[COMP_CWORD]}"

    # Skip "git" when invoked as "git lfs"
    first=1
    if [[ "\${COMP_WORDS[0]}" == "git" ]]; then
        first=2
    fi

    local -a args=("\${COMP_WORDS[@]:first:COMP_CWORD-first}")
    __${functionName(programName)}_debug "args: \${args[*]} cur: \${cur}"

    out=$(${programName} ${COMPLETE_NO_DESC_COMMAND} "\${args[@]}" "\${cur}" 2>/dev/null)
    if [[ $? -ne 0 ]]; then
        return
    fi

    local IFS=$'\\n'
    COMPREPLY=($(compgen -W "\${out}" -- "\${cur}"))
}

complete -o default -F __start_${programName} ${programName}
`);
}

export function renderZsh(programName: string, out: OutputSink): void {
  out.write(`#compdef ${programName}

_${programName}()
{
    local requestComp out line
    local -a completions

    requestComp="\${words[1]} ${COMPLETE_COMMAND} \${words[2,CURRENT]}"
    # An empty word under the cursor is lost when the request is eval'ed
    if [ -z "\${words[CURRENT]}" ]; then
        requestComp="\${requestComp} \\"\\""
    fi
    out=$(eval \${requestComp} 2>/dev/null)
    if [[ $? -ne 0 ]]; then
        return 1
    fi

    for line in "\${(@f)out}"; do
        [[ -z "\${line}" ]] && continue
        line="\${line//:/\\\\:}"
        completions+=("\${line/$'\\t'/:}")
    done

    _describe 'command' completions
}

if [ "$funcstack[1]" = "_${programName}" ]; then
    _${programName} "$@"
else
    compdef _${programName} ${programName}
fi
`);
}

export function renderFish(programName: string, out: OutputSink, includeDescriptions: boolean): void {
  const command = includeDescriptions ? COMPLETE_COMMAND : COMPLETE_NO_DESC_COMMAND;
  const name = functionName(programName);

  out.write(`# fish completion for ${programName}

function __${name}_perform_completion
    set -l args (commandline -opc)
    set -e args[1]
    set -l current (commandline -ct)
    ${programName} ${command} $args "$current" 2>/dev/null
end

complete -c ${programName} -f -a '(__${name}_perform_completion)'
`);
}

export function renderPowerShell(programName: string, out: OutputSink, includeDescriptions: boolean): void {
  const command = includeDescriptions ? COMPLETE_COMMAND : COMPLETE_NO_DESC_COMMAND;

  out.write(`# powershell completion for ${programName}

Register-ArgumentCompleter -CommandName '${programName}' -ScriptBlock {
    param($WordToComplete, $CommandAst, $CursorPosition)

    $Words = @($CommandAst.CommandElements | Select-Object -Skip 1 | ForEach-Object { $_.ToString() })
    if ($WordToComplete -eq '') {
        # Legacy argument passing drops empty arguments; standard passing keeps them
        if ($PSNativeCommandArgumentPassing -and $PSNativeCommandArgumentPassing -ne 'Legacy') {
            $Words += ''
        } else {
            $Words += '""'
        }
    }

    $Out = & '${programName}' ${command} @Words 2>$null
    foreach ($Line in $Out) {
        $Name, $Description = $Line -split "\`t", 2
        if (-not $Description) {
            $Description = $Name
        }
        [System.Management.Automation.CompletionResult]::new($Name, $Name, 'ParameterValue', $Description)
    }
}
`);
}
